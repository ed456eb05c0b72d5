import type { EditProposal } from "./types.js";

export type ModelProviderName = "gemini" | "anthropic" | "openrouter" | "dev";

/**
 * The model replied, but not with anything we could turn into edits, even after the
 * single reformatting retry. `rawResponse` is the last reply, kept for diagnostics.
 */
export class ModelResponseInvalid extends Error {
  readonly rawResponse: string;

  constructor(message: string, rawResponse: string) {
    super(message);
    this.name = "ModelResponseInvalid";
    this.rawResponse = rawResponse;
  }
}

/**
 * An accepted edit's recorded original text no longer matches the live document.
 * The whole apply call is abandoned; nothing from the batch is written.
 */
export class StaleEditError extends Error {
  readonly proposal: EditProposal;
  readonly actualText: string;

  constructor(proposal: EditProposal, actualText: string, detail?: string) {
    super(
      detail ??
        `Edit ${proposal.id} (${proposal.file} L${proposal.startLine}-${proposal.endLine}) no longer matches the document.`
    );
    this.name = "StaleEditError";
    this.proposal = proposal;
    this.actualText = actualText;
  }
}

export class OverlapError extends Error {
  readonly proposals: EditProposal[];

  constructor(proposals: EditProposal[]) {
    super(
      `Accepted edits overlap: ${proposals
        .map((proposal) => `${proposal.file} L${proposal.startLine}-${proposal.endLine}`)
        .join(", ")}`
    );
    this.name = "OverlapError";
    this.proposals = proposals;
  }
}

export class UpstreamModelError extends Error {
  readonly provider: ModelProviderName;
  readonly status?: number;
  readonly transient: boolean;

  constructor(message: string, opts: { provider: ModelProviderName; status?: number; transient: boolean }) {
    super(message);
    this.name = "UpstreamModelError";
    this.provider = opts.provider;
    this.status = opts.status;
    this.transient = opts.transient;
  }
}

export class ProjectNotFoundError extends Error {
  readonly projectId: string;

  constructor(projectId: string) {
    super(`Project "${projectId}" not found.`);
    this.name = "ProjectNotFoundError";
    this.projectId = projectId;
  }
}

export class FileNotFoundError extends Error {
  readonly fileName: string;

  constructor(fileName: string) {
    super(`File "${fileName}" not found in project.`);
    this.name = "FileNotFoundError";
    this.fileName = fileName;
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "APIUserAbortError");
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createAbortError(message = "The operation was aborted."): Error {
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw createAbortError();
  }
}
