import { describe, expect, it } from "vitest";
import { computeLayout, paneViewportHeight } from "./layout";

describe("layout", () => {
  it("splits the space beside the tree between editor and preview", () => {
    expect(computeLayout(100, 30, true)).toEqual({ treeWidth: 30, editorWidth: 35, previewWidth: 35, bodyHeight: 27 });
  });

  it("clamps the tree width and gives the editor the rest", () => {
    const layout = computeLayout(200, 50, false);

    expect(layout.treeWidth).toBe(48);
    expect(layout.editorWidth).toBe(152);
    expect(layout.previewWidth).toBe(0);
    expect(paneViewportHeight(layout)).toBe(45);
  });

  it("lays tiny terminals out at the minimum size", () => {
    expect(computeLayout(10, 5, true)).toEqual({ treeWidth: 20, editorWidth: 10, previewWidth: 10, bodyHeight: 7 });
  });
});
