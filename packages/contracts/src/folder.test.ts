/**
 * Folder Ids — Test Suite
 */

import { describe, it, expect } from "vitest";
import { FolderIdSchema, ROOT_FOLDER_ID } from "./folder.js";

describe("FolderIdSchema", () => {
  it("accepts UUIDs, the root's nil UUID included", () => {
    expect(FolderIdSchema.safeParse(ROOT_FOLDER_ID).success).toBe(true);
    expect(FolderIdSchema.safeParse("6F1C2A3B-4D5E-4F60-8A7B-9C0D1E2F3A4B").success).toBe(true);
  });

  it("rejects anything else", () => {
    expect(FolderIdSchema.safeParse("42").success).toBe(false);
    expect(FolderIdSchema.safeParse("docs").success).toBe(false);
    expect(FolderIdSchema.safeParse(`${ROOT_FOLDER_ID}0`).success).toBe(false);
  });
});
