import { v4 as uuidv4 } from "uuid";
import { buildDiffHtml } from "../services/documentService.js";
import type {
  AcceptState,
  AgentEditResponse,
  EditProposal,
  ProposalSet,
  RawEdit,
  RejectedProposal,
  WireChange,
  WireRejection
} from "../types.js";

export function createProposal(raw: RawEdit, file: string, lineOffset = 0): EditProposal {
  return {
    id: uuidv4(),
    file,
    startLine: raw.start_line + lineOffset,
    endLine: raw.end_line + lineOffset,
    originalText: raw.original,
    replacementText: raw.replacement,
    reason: raw.reason,
    accepted: "undecided"
  };
}

export function markAccepted(proposal: EditProposal, accepted: AcceptState): EditProposal {
  return { ...proposal, accepted };
}

/** Range + replacement identity, used to collapse duplicates from overlapping windows. */
export function proposalKey(proposal: EditProposal): string {
  return `${proposal.file}|${proposal.startLine}|${proposal.endLine}|${proposal.replacementText}`;
}

export function normalizeAcceptState(value: AcceptState | boolean | null | undefined): AcceptState {
  if (value === true || value === "accepted") {
    return "accepted";
  }
  if (value === false || value === "rejected") {
    return "rejected";
  }
  return "undecided";
}

export function toWireChange(proposal: EditProposal, opts?: { withDiff?: boolean }): WireChange {
  const change: WireChange = {
    id: proposal.id,
    file: proposal.file,
    start_line: proposal.startLine,
    end_line: proposal.endLine,
    original: proposal.originalText,
    replacement: proposal.replacementText,
    reason: proposal.reason,
    accepted: proposal.accepted
  };
  if (opts?.withDiff) {
    change.diff_html = buildDiffHtml(proposal.originalText, proposal.replacementText);
  }
  return change;
}

export function fromWireChange(
  change: Omit<WireChange, "accepted" | "id" | "diff_html"> & {
    id?: string;
    accepted?: AcceptState | boolean | null;
  }
): EditProposal {
  return {
    id: change.id ?? uuidv4(),
    file: change.file,
    startLine: change.start_line,
    endLine: change.end_line,
    originalText: change.original,
    replacementText: change.replacement,
    reason: change.reason,
    accepted: normalizeAcceptState(change.accepted)
  };
}

export function toWireRejection(rejection: RejectedProposal): WireRejection {
  return {
    change: toWireChange(rejection.proposal),
    reason: rejection.reason
  };
}

export function toAgentEditResponse(set: ProposalSet): AgentEditResponse {
  return {
    explanation: set.explanation,
    changes: set.proposals.map((proposal) => toWireChange(proposal, { withDiff: true })),
    rejected: set.rejected.map(toWireRejection),
    tokens: set.tokensUsed
  };
}
