import { describe, expect, it } from "vitest";
import type { ExtractedFragment, ExtractedPage } from "./pdf-types.ts";
import { collectPageLines } from "./text-lines.ts";

function fragment(text: string, x: number, y: number): ExtractedFragment {
  return { text, x, y };
}

function page(pageIndex: number, fragments: ExtractedFragment[]): ExtractedPage {
  return { pageIndex, height: 792, fragments };
}

describe("collectPageLines", () => {
  it("joins fragments sharing a baseline from left to right, top line first", () => {
    const lines = collectPageLines({
      pages: [
        page(0, [
          fragment("26-0000001 THEFT", 20, 680),
          fragment("1/2/2026", 400, 700),
          fragment("SMITH, JOHN", 20, 700),
          fragment("1234567", 300, 700.6),
        ]),
      ],
    });

    expect(lines).toEqual([["SMITH, JOHN 1234567 1/2/2026", "26-0000001 THEFT"]]);
  });

  it("orders pages by index and keeps empty pages", () => {
    const lines = collectPageLines({
      pages: [page(1, [fragment("JONES, JANE", 20, 700)]), page(0, [])],
    });

    expect(lines).toEqual([[], ["JONES, JANE"]]);
  });

  it("drops fragments placed far outside the page", () => {
    const lines = collectPageLines({
      pages: [page(0, [fragment("SMITH, JOHN", 20, 700), fragment("stray", 20, 5000)])],
    });

    expect(lines).toEqual([["SMITH, JOHN"]]);
  });
});
