import { describe, expect, it } from "vitest";
import { environmentDepths, estimateTokens, mergeWindowResults, planWindows, windowText } from "../src/editing/batchPlanner.js";
import type { BatchWindow, WindowResult } from "../src/types.js";
import { makeProposal } from "./helpers.js";

const tenLines = Array.from({ length: 10 }, (_, index) => `aa${String(index + 1).padStart(2, "0")}`).join("\n");

function ranges(windows: BatchWindow[]): Array<[number, number]> {
  return windows.map((window) => [window.firstLine, window.lastLine]);
}

describe("estimateTokens", () => {
  it("rounds four characters per token up", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abcd")).toBe(1);
    expect(estimateTokens("abcde")).toBe(2);
  });
});

describe("planWindows", () => {
  it("returns no windows for an empty document", () => {
    expect(planWindows("", { tokenThreshold: 10, overlapLines: 1 })).toEqual([]);
  });

  it("keeps a small document in one window", () => {
    expect(planWindows("a\nb\nc", { tokenThreshold: 6000, overlapLines: 3 })).toEqual([
      { chunkIndex: 0, firstLine: 1, lastLine: 3 }
    ]);
  });

  it("splits a large document into overlapping windows", () => {
    const windows = planWindows(tenLines, { tokenThreshold: 6, overlapLines: 1 });
    expect(ranges(windows)).toEqual([
      [1, 3],
      [3, 5],
      [5, 7],
      [7, 9],
      [9, 10]
    ]);
    expect(windows.map((window) => window.chunkIndex)).toEqual([0, 1, 2, 3, 4]);
  });

  it("batches a small document when forced", () => {
    const windows = planWindows("aa01\naa02\naa03\naa04", { forceBatch: true, tokenThreshold: 6, overlapLines: 0 });
    expect(ranges(windows)).toEqual([
      [1, 3],
      [4, 4]
    ]);
  });

  it("gives an oversized line a window of its own and drops context for it", () => {
    const text = ["aaaa", "x".repeat(40), "bb"].join("\n");
    expect(ranges(planWindows(text, { tokenThreshold: 6, overlapLines: 1 }))).toEqual([
      [1, 1],
      [2, 2],
      [3, 3]
    ]);
  });

  it("does not end a window inside an environment that fits in one", () => {
    const text = ["aa01", "\\begin{x}", "bb", "\\end{x}", "cc"].join("\n");
    expect(ranges(planWindows(text, { forceBatch: true, tokenThreshold: 9, overlapLines: 0 }))).toEqual([
      [1, 1],
      [2, 4],
      [5, 5]
    ]);
  });

  it("splits an environment by lines when it cannot fit", () => {
    const text = ["\\begin{x}", "bbbbbbbb", "cccccccc", "\\end{x}"].join("\n");
    expect(ranges(planWindows(text, { forceBatch: true, tokenThreshold: 7, overlapLines: 0 }))).toEqual([
      [1, 2],
      [3, 4]
    ]);
  });

  it("covers every line", () => {
    const windows = planWindows(tenLines, { tokenThreshold: 8, overlapLines: 2 });
    const covered = new Set<number>();
    for (const window of windows) {
      for (let line = window.firstLine; line <= window.lastLine; line += 1) {
        covered.add(line);
      }
    }
    expect(covered.size).toBe(10);
  });

  it("extracts window text", () => {
    expect(windowText(tenLines, { chunkIndex: 1, firstLine: 3, lastLine: 4 })).toBe("aa03\naa04");
  });
});

describe("environmentDepths", () => {
  it("tracks nesting and skips the document environment and comments", () => {
    expect(
      environmentDepths([
        "\\begin{document}",
        "\\begin{itemize}",
        "% \\end{itemize}",
        "\\item a 50\\% \\begin{quote}",
        "\\end{quote}\\end{itemize}",
        "\\end{document}"
      ])
    ).toEqual([0, 1, 1, 2, 0, 0]);
  });
});

describe("mergeWindowResults", () => {
  it("orders by window, sums tokens and drops duplicate edits", () => {
    const first: WindowResult = {
      window: { chunkIndex: 0, firstLine: 1, lastLine: 3 },
      explanation: "first ",
      proposals: [makeProposal({ id: "a", startLine: 3, endLine: 3, originalText: "aa03", replacementText: "bb03" })],
      tokensUsed: 5
    };
    const second: WindowResult = {
      window: { chunkIndex: 1, firstLine: 3, lastLine: 5 },
      explanation: "second",
      proposals: [
        makeProposal({ id: "b", startLine: 3, endLine: 3, originalText: "aa03", replacementText: "bb03" }),
        makeProposal({ id: "c", startLine: 5, endLine: 5, originalText: "aa05", replacementText: "bb05" })
      ],
      tokensUsed: 7
    };
    const empty: WindowResult = {
      window: { chunkIndex: 2, firstLine: 5, lastLine: 6 },
      explanation: "  ",
      proposals: [],
      tokensUsed: 1
    };

    const merged = mergeWindowResults([empty, second, first]);

    expect(merged.proposals.map((proposal) => proposal.id)).toEqual(["a", "c"]);
    expect(merged.explanation).toBe("first\n\nsecond");
    expect(merged.tokensUsed).toBe(13);
  });
});
