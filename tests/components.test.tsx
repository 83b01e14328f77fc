import { describe, it, expect } from "vitest";
import { render } from "ink-testing-library";
import { Footer, footerHints } from "../src/components/Footer";
import { matchCounter } from "../src/components/SearchBar";
import { TreePane } from "../src/components/TreePane";
import { paneTitle } from "../src/components/App";
import { scrollOffset } from "../src/components/viewport";
import { DEFAULT_THEME } from "../src/config/theme";
import type { VisibleRow } from "../src/types";
import { plainFrame } from "./helpers";

function row(path: string, label: string, depth = 0): VisibleRow {
  return { path, label, depth, isDirectory: true, isExpanded: false, parentPath: null };
}

describe("components.viewport", () => {
  it("should keep the window still while the selection is inside it", () => {
    expect(scrollOffset(0, 3, 5, 20)).toBe(0);
    expect(scrollOffset(4, 6, 5, 20)).toBe(4);
  });

  it("should follow the selection past either edge", () => {
    expect(scrollOffset(0, 7, 5, 20)).toBe(3);
    expect(scrollOffset(10, 2, 5, 20)).toBe(2);
  });

  it("should not scroll short lists", () => {
    expect(scrollOffset(3, 2, 10, 4)).toBe(0);
  });
});

describe("components.TreePane", () => {
  it("should indent rows and mark the selection", () => {
    const rows = [row("/r/a", "📂 a"), row("/r/a/b", "📁 b", 1), row("/r/c", "📁 c")];
    const { lastFrame, unmount } = render(
      <TreePane title="/r" rows={rows} selectedIndex={1} height={5} accent="cyan" theme={DEFAULT_THEME} />,
    );
    const frame = plainFrame(lastFrame());

    expect(frame).toContain(" /r ");
    expect(frame).toContain("▸   📁 b");
    expect(frame).toContain("  📂 a");
    unmount();
  });

  it("should render only the rows that fit", () => {
    const rows = Array.from({ length: 10 }, (_, i) => row(`/r/d${i}`, `📁 d${i}`));
    const { lastFrame, unmount } = render(
      <TreePane title="/r" rows={rows} selectedIndex={0} height={3} accent="cyan" theme={DEFAULT_THEME} />,
    );
    const frame = plainFrame(lastFrame());

    expect(frame).toContain("📁 d2");
    expect(frame).not.toContain("📁 d3");
    unmount();
  });
});

describe("components.Footer", () => {
  it("should prefix the hidden marker in the tree view only", () => {
    expect(footerHints("tree", true)[0]).toEqual(["●", "hidden"]);
    expect(footerHints("tree", false)[0]).toEqual(["↑↓/jk", "nav"]);
    expect(footerHints("starred", true)[0]).toEqual(["↑↓/jk", "navigate"]);
  });

  it("should render the hints of the active view", () => {
    const { lastFrame, unmount } = render(<Footer view="recent" showHidden={false} theme={DEFAULT_THEME} />);
    expect(plainFrame(lastFrame())).toContain("r back");
    unmount();
  });
});

describe("components.SearchBar", () => {
  it("should count matches from one", () => {
    expect(matchCounter("ab", 0, 3)).toBe(" [1/3]");
    expect(matchCounter("ab", 0, 0)).toBe(" [no match]");
    expect(matchCounter("", 0, 0)).toBe("");
  });
});

describe("components.App", () => {
  it("should title each view", () => {
    expect(paneTitle("tree", "/home/me")).toBe("/home/me");
    expect(paneTitle("starred", "/home/me")).toBe("★ Starred");
    expect(paneTitle("bookmarks", "/home/me")).toBe("📌 Bookmarks");
    expect(paneTitle("recent", "/home/me")).toBe("⏱ Recent");
  });
});
