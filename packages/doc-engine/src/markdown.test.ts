import { describe, expect, it } from "vitest";
import { extractTags, formatNoteForExport, parseMarkdownNote, sanitizeFileName } from "./markdown";

describe("doc-engine markdown helpers", () => {
  it("replaces reserved file name characters", () => {
    expect(sanitizeFileName("  Plans: Q1/Q2 <draft>?  ")).toBe("Plans_ Q1_Q2 _draft__");
    expect(sanitizeFileName("tab\there")).toBe("tab_here");
    expect(sanitizeFileName("   ")).toBe("Untitled");
  });

  it("extracts lowercase hashtags", () => {
    expect(extractTags("# Heading\n\n#Work and #ideas/later, not a#tag")).toEqual(["work", "ideas/later"]);
  });

  it("formats a note with a metadata header", () => {
    const markdown = formatNoteForExport({
      title: "Plan",
      content: "Ship it.",
      tags: ["work", "q1"],
      createdAt: "2024-03-09T08:05:01.000Z",
      modifiedAt: "2024-03-10T18:30:00.000Z"
    });

    expect(markdown).toBe(
      "# Plan\n\nCreated: 2024-03-09 08:05:01\nModified: 2024-03-10 18:30:00\nTags: work, q1\n\n---\n\nShip it."
    );
  });

  it("reads back exported notes without the metadata header", () => {
    const parsed = parseMarkdownNote(
      "# Plan\n\nCreated: 2024-03-09 08:05:01\nModified: 2024-03-10 18:30:00\nTags: work, q1\n\n---\n\nLine one\nLine two",
      "fallback"
    );

    expect(parsed).toEqual({
      title: "Plan",
      content: "Line one\nLine two",
      tags: ["work", "q1"],
      createdAt: "2024-03-09T08:05:01.000Z",
      modifiedAt: "2024-03-10T18:30:00.000Z"
    });
  });

  it("uses a leading heading as the title", () => {
    expect(parseMarkdownNote("# Groceries\n\n- milk\n- eggs", "groceries")).toEqual({
      title: "Groceries",
      content: "- milk\n- eggs",
      tags: []
    });
  });

  it("falls back to the file name without a heading", () => {
    expect(parseMarkdownNote("just text #inbox", "scratch")).toEqual({
      title: "scratch",
      content: "just text #inbox",
      tags: ["inbox"]
    });
  });
});
