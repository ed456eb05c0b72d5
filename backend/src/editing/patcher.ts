import { OverlapError, StaleEditError } from "../errors.js";
import {
  dominantEol,
  getFile,
  joinTerminatedLines,
  splitTerminatedLines,
  withFileContent,
  type TerminatedLine
} from "../services/documentService.js";
import type { EditProposal, ProjectDocument } from "../types.js";
import { checkProposal, findOverlaps } from "./validator.js";

export function replacementLines(replacementText: string): string[] {
  if (replacementText.length === 0) {
    return [];
  }
  const normalized = replacementText.replace(/\r\n/g, "\n");
  const body = normalized.endsWith("\n") ? normalized.slice(0, -1) : normalized;
  return body.split("\n");
}

// Untouched lines keep their own endings. Inserted lines take the file's dominant
// ending, except the last one, which inherits the ending of the range it replaces.
function spliceFile(content: string, proposals: EditProposal[]): string {
  const lines = splitTerminatedLines(content);
  const eol = dominantEol(lines);
  const descending = [...proposals].sort((left, right) => right.startLine - left.startLine);

  for (const proposal of descending) {
    const start = proposal.startLine - 1;
    const count = proposal.endLine - proposal.startLine + 1;
    const boundary = lines[start + count - 1].eol;
    const inserted: TerminatedLine[] = replacementLines(proposal.replacementText).map((text) => ({ text, eol }));
    if (inserted.length > 0) {
      inserted[inserted.length - 1].eol = boundary;
    } else if (boundary === "" && start > 0) {
      lines[start - 1].eol = "";
    }
    lines.splice(start, count, ...inserted);
  }

  return joinTerminatedLines(lines);
}

/**
 * Applies accepted proposals and returns a new document; the input is not touched.
 *
 * Every proposal is re-checked against `document` first and the first stale or
 * out-of-range one aborts the whole call. Each file is then spliced bottom-up so
 * earlier line numbers stay valid while later ranges change length.
 */
export function applyProposals(document: ProjectDocument, accepted: EditProposal[]): ProjectDocument {
  if (accepted.length === 0) {
    return document;
  }

  for (const proposal of accepted) {
    const check = checkProposal(document, proposal);
    if (!check.ok) {
      const actual = check.rejection.reason.kind === "stale" ? check.rejection.reason.actualText : "";
      throw new StaleEditError(proposal, actual, check.rejection.reason.message);
    }
  }

  const overlaps = findOverlaps(accepted);
  if (overlaps.size > 0) {
    throw new OverlapError(accepted.filter((_, index) => overlaps.has(index)));
  }

  const byFile = new Map<string, EditProposal[]>();
  for (const proposal of accepted) {
    const group = byFile.get(proposal.file) ?? [];
    group.push(proposal);
    byFile.set(proposal.file, group);
  }

  let next = document;
  for (const [fileName, group] of byFile) {
    const file = getFile(next, fileName);
    if (!file) {
      continue;
    }
    next = withFileContent(next, fileName, spliceFile(file.content, group));
  }

  return next;
}
