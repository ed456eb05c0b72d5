import { getFile, sliceLines, splitLines } from "../services/documentService.js";
import type { EditProposal, ProjectDocument, RejectedProposal, ValidationResult } from "../types.js";

function stripLineEndCr(text: string): string {
  return text.replace(/\r$/gm, "");
}

/** Exact up to carriage returns; the original may also carry one extra trailing newline. */
export function matchesOriginal(currentText: string, originalText: string): boolean {
  const current = stripLineEndCr(currentText);
  const original = stripLineEndCr(originalText);
  return current === original || (original.endsWith("\n") && current === original.slice(0, -1));
}

export type RangeCheck =
  | { ok: true; currentText: string }
  | { ok: false; rejection: RejectedProposal };

/** Range first, then staleness; slicing is only done on in-range proposals. */
export function checkProposal(document: ProjectDocument, proposal: EditProposal): RangeCheck {
  const file = getFile(document, proposal.file);
  if (!file) {
    return {
      ok: false,
      rejection: {
        proposal,
        reason: {
          kind: "out_of_range",
          message: `out_of_range: file "${proposal.file}" does not exist`,
          lineCount: 0
        }
      }
    };
  }

  const total = splitLines(file.content).length;
  const { startLine, endLine } = proposal;
  if (
    !Number.isInteger(startLine) ||
    !Number.isInteger(endLine) ||
    startLine < 1 ||
    endLine < startLine ||
    endLine > total
  ) {
    return {
      ok: false,
      rejection: {
        proposal,
        reason: {
          kind: "out_of_range",
          message: `out_of_range: lines ${startLine}-${endLine} fall outside 1-${total}`,
          lineCount: total
        }
      }
    };
  }

  const currentText = sliceLines(file.content, startLine, endLine);
  if (!matchesOriginal(currentText, proposal.originalText)) {
    return {
      ok: false,
      rejection: {
        proposal,
        reason: {
          kind: "stale",
          message: "stale: document changed since proposal was generated",
          actualText: currentText
        }
      }
    };
  }

  return { ok: true, currentText };
}

function compareByPosition(left: EditProposal, right: EditProposal): number {
  if (left.file !== right.file) {
    return left.file < right.file ? -1 : 1;
  }
  return left.startLine - right.startLine || left.endLine - right.endLine;
}

/**
 * Returns every proposal that intersects another, keyed by its index in
 * `proposals`, with the indexes it collides with. Ranges are inclusive, so [1,2]
 * and [2,3] overlap. Ids are not trusted to be unique here.
 */
export function findOverlaps(proposals: EditProposal[]): Map<number, number[]> {
  const order = proposals.map((_, index) => index);
  order.sort((left, right) => compareByPosition(proposals[left], proposals[right]) || left - right);
  const overlaps = new Map<number, number[]>();
  const note = (from: number, to: number): void => {
    const list = overlaps.get(from) ?? [];
    list.push(to);
    overlaps.set(from, list);
  };

  for (let position = 0; position < order.length; position += 1) {
    const current = proposals[order[position]];
    for (let next = position + 1; next < order.length; next += 1) {
      const candidate = proposals[order[next]];
      if (candidate.file !== current.file || candidate.startLine > current.endLine) {
        break;
      }
      note(order[position], order[next]);
      note(order[next], order[position]);
    }
  }

  for (const list of overlaps.values()) {
    list.sort((left, right) => left - right);
  }
  return overlaps;
}

/**
 * Partitions proposals against the current document into appliable and rejected.
 * Overlapping proposals are rejected together; no winner is picked.
 */
export function validateProposals(document: ProjectDocument, proposals: EditProposal[]): ValidationResult {
  const rejections = new Map<number, RejectedProposal>();
  const survivors: number[] = [];

  proposals.forEach((proposal, index) => {
    const check = checkProposal(document, proposal);
    if (check.ok) {
      survivors.push(index);
    } else {
      rejections.set(index, check.rejection);
    }
  });

  const overlaps = findOverlaps(survivors.map((index) => proposals[index]));
  for (const [position, others] of overlaps) {
    const proposal = proposals[survivors[position]];
    rejections.set(survivors[position], {
      proposal,
      reason: {
        kind: "overlaps",
        message: `overlaps: lines ${proposal.startLine}-${proposal.endLine} collide with another proposed edit`,
        overlapsWith: others.map((other) => proposals[survivors[other]].id)
      }
    });
  }

  const valid: EditProposal[] = [];
  const rejected: RejectedProposal[] = [];
  proposals.forEach((proposal, index) => {
    const rejection = rejections.get(index);
    if (rejection) {
      rejected.push(rejection);
    } else {
      valid.push(proposal);
    }
  });

  return { valid, rejected };
}
