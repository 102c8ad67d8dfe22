import { describe, it, expect } from "vitest";
import { displaySize, fileExtension, validateAttachments } from "../attachmentPolicy";
import { MiB, file } from "../../test/fixtures";
import { AttachmentLimitExceededError, UnsupportedFileTypeError } from "../../utils/errors";

describe("fileExtension", () => {
  it("lowercases the last extension", () => {
    expect(fileExtension("Report.Final.PDF")).toBe("pdf");
  });

  it("returns nothing for dotfiles and bare names", () => {
    expect(fileExtension(".env")).toBe("");
    expect(fileExtension("README")).toBe("");
    expect(fileExtension("trailing.")).toBe("");
  });
});

describe("validateAttachments", () => {
  it("accepts an empty batch", () => {
    expect(() => validateAttachments([])).not.toThrow();
  });

  it("accepts a file exactly at the per-file limit", () => {
    expect(() => validateAttachments([file("exact.zip", 5 * MiB)])).not.toThrow();
  });

  it("checks the type before the size", () => {
    expect(() => validateAttachments([file("huge.iso", 50 * MiB)])).toThrow(UnsupportedFileTypeError);
  });

  it("rejects a batch over the total with the limit in the message", () => {
    const files = Array.from({ length: 6 }, (_, i) => file(`part-${i}.zip`, 5 * MiB));
    expect(() => validateAttachments(files)).toThrow(AttachmentLimitExceededError);
    expect(() => validateAttachments(files)).toThrow("Total file size exceeds 25MB limit");
  });

  it("honours custom limits", () => {
    const limits = { maxFileBytes: 100, maxFiles: 1, maxTotalBytes: 100, allowedExtensions: new Set(["txt"]) };
    expect(() => validateAttachments([file("a.txt", 10), file("b.txt", 10)], limits)).toThrow(
      "Maximum 1 files per message"
    );
    expect(() => validateAttachments([file("a.png", 10)], limits)).toThrow('File type of "a.png" is not supported');
  });
});

describe("displaySize", () => {
  it("formats bytes with one decimal", () => {
    expect(displaySize(512)).toBe("512.0 B");
    expect(displaySize(1536)).toBe("1.5 KB");
    expect(displaySize(5 * MiB)).toBe("5.0 MB");
  });
});
