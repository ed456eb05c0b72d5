import { describe, expect, it } from "vitest";
import { checkProposal, findOverlaps, validateProposals } from "../src/editing/validator.js";
import { createDocument, singleFileDocument } from "../src/services/documentService.js";
import { makeProposal } from "./helpers.js";

const document = singleFileDocument("main.tex", "A\nB\nC\n");

describe("checkProposal", () => {
  it("accepts a proposal whose original matches", () => {
    const check = checkProposal(document, makeProposal({ startLine: 2, endLine: 3, originalText: "B\nC", replacementText: "X" }));
    expect(check).toEqual({ ok: true, currentText: "B\nC" });
  });

  it("ignores a trailing newline and carriage returns in the original", () => {
    const crlf = singleFileDocument("main.tex", "A\r\nB\r\n");
    const check = checkProposal(crlf, makeProposal({ startLine: 1, endLine: 2, originalText: "A\r\nB\r\n", replacementText: "" }));
    expect(check.ok).toBe(true);
  });

  it("does not let a short original match a range with an extra empty line", () => {
    const padded = singleFileDocument("main.tex", "A\nB\n\nC\n");
    expect(checkProposal(padded, makeProposal({ startLine: 2, endLine: 3, originalText: "B", replacementText: "" })).ok).toBe(false);
    expect(checkProposal(padded, makeProposal({ startLine: 2, endLine: 3, originalText: "B\n", replacementText: "" })).ok).toBe(true);
    expect(checkProposal(padded, makeProposal({ startLine: 2, endLine: 2, originalText: "B\n", replacementText: "" })).ok).toBe(true);
  });

  it("reports the live text of a stale range", () => {
    const edited = singleFileDocument("main.tex", "A\nX\nC\n");
    const check = checkProposal(edited, makeProposal({ startLine: 2, endLine: 2, originalText: "B", replacementText: "Y" }));
    expect(check.ok).toBe(false);
    if (!check.ok) {
      expect(check.rejection.reason).toEqual({
        kind: "stale",
        message: "stale: document changed since proposal was generated",
        actualText: "X"
      });
    }
  });

  it("rejects ranges past the end of the file", () => {
    const check = checkProposal(document, makeProposal({ startLine: 2, endLine: 5, originalText: "B", replacementText: "" }));
    expect(check.ok).toBe(false);
    if (!check.ok) {
      expect(check.rejection.reason).toEqual({
        kind: "out_of_range",
        message: "out_of_range: lines 2-5 fall outside 1-3",
        lineCount: 3
      });
    }
  });

  it("rejects inverted ranges and unknown files", () => {
    expect(checkProposal(document, makeProposal({ startLine: 3, endLine: 2, originalText: "", replacementText: "" })).ok).toBe(false);
    const unknown = checkProposal(
      document,
      makeProposal({ file: "other.tex", startLine: 1, endLine: 1, originalText: "A", replacementText: "" })
    );
    expect(unknown.ok).toBe(false);
    if (!unknown.ok) {
      expect(unknown.rejection.reason).toMatchObject({ kind: "out_of_range", lineCount: 0 });
    }
  });
});

describe("findOverlaps", () => {
  it("treats shared boundary lines as overlapping", () => {
    const overlaps = findOverlaps([
      makeProposal({ id: "one", startLine: 1, endLine: 2, originalText: "", replacementText: "" }),
      makeProposal({ id: "two", startLine: 2, endLine: 3, originalText: "", replacementText: "" })
    ]);
    expect(overlaps.get(0)).toEqual([1]);
    expect(overlaps.get(1)).toEqual([0]);
  });

  it("lets adjacent ranges and other files through", () => {
    const overlaps = findOverlaps([
      makeProposal({ id: "one", startLine: 1, endLine: 1, originalText: "", replacementText: "" }),
      makeProposal({ id: "two", startLine: 2, endLine: 2, originalText: "", replacementText: "" }),
      makeProposal({ id: "three", file: "other.tex", startLine: 1, endLine: 2, originalText: "", replacementText: "" })
    ]);
    expect(overlaps.size).toBe(0);
  });
});

describe("validateProposals", () => {
  it("rejects both sides of an overlap", () => {
    const result = validateProposals(document, [
      makeProposal({ id: "one", startLine: 1, endLine: 2, originalText: "A\nB", replacementText: "1" }),
      makeProposal({ id: "two", startLine: 2, endLine: 3, originalText: "B\nC", replacementText: "2" })
    ]);
    expect(result.valid).toEqual([]);
    expect(result.rejected.map((item) => [item.proposal.id, item.reason.kind])).toEqual([
      ["one", "overlaps"],
      ["two", "overlaps"]
    ]);
  });

  it("keeps input order across valid and rejected proposals", () => {
    const project = createDocument([
      { name: "main.tex", content: "A\nB\nC\n" },
      { name: "intro.tex", content: "I\n" }
    ]);
    const result = validateProposals(project, [
      makeProposal({ id: "c", startLine: 3, endLine: 3, originalText: "C", replacementText: "c" }),
      makeProposal({ id: "stale", startLine: 2, endLine: 2, originalText: "Z", replacementText: "b" }),
      makeProposal({ id: "a", startLine: 1, endLine: 1, originalText: "A", replacementText: "a" }),
      makeProposal({ id: "intro", file: "intro.tex", startLine: 1, endLine: 1, originalText: "I", replacementText: "i" })
    ]);
    expect(result.valid.map((proposal) => proposal.id)).toEqual(["c", "a", "intro"]);
    expect(result.rejected.map((item) => item.proposal.id)).toEqual(["stale"]);
  });

  it("partitions proposals that share an id", () => {
    const good = makeProposal({ id: "x", startLine: 1, endLine: 1, originalText: "A", replacementText: "a" });
    const stale = makeProposal({ id: "x", startLine: 3, endLine: 3, originalText: "Q", replacementText: "q" });
    const result = validateProposals(document, [good, stale]);
    expect(result.valid).toEqual([good]);
    expect(result.rejected).toHaveLength(1);
    expect(result.rejected[0].proposal).toBe(stale);
    expect(result.rejected[0].reason.kind).toBe("stale");
  });

  it("rejects only the overlapping one of two proposals with the same id", () => {
    const first = makeProposal({ id: "x", startLine: 1, endLine: 1, originalText: "A", replacementText: "a" });
    const second = makeProposal({ id: "x", startLine: 3, endLine: 3, originalText: "C", replacementText: "c" });
    const third = makeProposal({ id: "y", startLine: 3, endLine: 3, originalText: "C", replacementText: "k" });
    const result = validateProposals(document, [first, second, third]);
    expect(result.valid).toEqual([first]);
    expect(result.rejected.map((item) => [item.proposal, item.reason.kind])).toEqual([
      [second, "overlaps"],
      [third, "overlaps"]
    ]);
  });
});
