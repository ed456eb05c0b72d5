import { resolveModelName, type BatchSettings, type ModelSettings } from "../config.js";
import { mergeWindowResults, planWindows, windowText } from "../editing/batchPlanner.js";
import { validateProposals } from "../editing/validator.js";
import { createAbortError, isAbortError } from "../errors.js";
import { log } from "../logger.js";
import type { AgentEditRequest, BatchWindow, ProposalSet, WindowResult } from "../types.js";
import type { AgentEditService, InvokeWindowArgs, StreamWindowEvent } from "./agentEditService.js";
import { singleFileDocument } from "./documentService.js";

export type TokenUsage = {
  projectId: string;
  provider: string;
  model: string;
  tokensUsed: number;
};

// Accounting itself lives outside this service; recorders only receive the numbers.
export interface TokenUsageRecorder {
  record(usage: TokenUsage): void;
}

export const loggingTokenRecorder: TokenUsageRecorder = {
  record(usage) {
    log.info("Token usage", usage);
  }
};

export type AgentEditPipelineDeps = {
  service: AgentEditService;
  model: ModelSettings;
  batch: BatchSettings;
  recorder?: TokenUsageRecorder;
};

/**
 * Runs `fn` over `items` with at most `limit` calls in flight and returns results in
 * input order. The first failure aborts the shared controller and is rethrown.
 */
export async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  controller: AbortController,
  fn: (item: T, signal: AbortSignal) => Promise<R>
): Promise<R[]> {
  const results = new Array<R | undefined>(items.length);
  let next = 0;
  let failure: { error: unknown } | undefined;

  const worker = async (): Promise<void> => {
    while (next < items.length && !failure) {
      const index = next;
      next += 1;
      try {
        results[index] = await fn(items[index], controller.signal);
      } catch (error) {
        if (!failure) {
          failure = { error };
          controller.abort();
        }
      }
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);

  if (failure) {
    throw failure.error;
  }
  return results.flatMap((result) => (result === undefined ? [] : [result]));
}

function linkSignal(signal?: AbortSignal): AbortController {
  const controller = new AbortController();
  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener("abort", () => controller.abort(), { once: true });
  }
  return controller;
}

export class AgentEditPipeline {
  constructor(private readonly deps: AgentEditPipelineDeps) {}

  plan(request: AgentEditRequest): BatchWindow[] {
    return planWindows(request.document, {
      forceBatch: request.forceBatch,
      tokenThreshold: this.deps.batch.tokenThreshold,
      overlapLines: this.deps.batch.overlapLines
    });
  }

  private windowArgs(
    request: AgentEditRequest,
    window: BatchWindow,
    windowCount: number,
    signal: AbortSignal,
    earlier: WindowResult[]
  ): InvokeWindowArgs {
    return {
      instruction: request.instruction,
      windowText: windowText(request.document, window),
      window,
      windowCount,
      file: request.file,
      model: resolveModelName(this.deps.model, request.model),
      selection: request.selection,
      images: request.images,
      priorEdits: earlier.flatMap((result) => result.proposals),
      signal
    };
  }

  private finish(request: AgentEditRequest, results: WindowResult[], windowCount: number): ProposalSet {
    const merged = mergeWindowResults(results);
    const document = singleFileDocument(request.file, request.document);
    const { valid, rejected } = validateProposals(document, merged.proposals);

    if (rejected.length > 0) {
      log.info("Proposals rejected during validation", {
        projectId: request.projectId,
        rejected: rejected.map((item) => ({ id: item.proposal.id, kind: item.reason.kind }))
      });
    }

    (this.deps.recorder ?? loggingTokenRecorder).record({
      projectId: request.projectId,
      provider: this.deps.service.provider,
      model: resolveModelName(this.deps.model, request.model),
      tokensUsed: merged.tokensUsed
    });

    return {
      explanation: merged.explanation,
      proposals: valid,
      rejected,
      tokensUsed: merged.tokensUsed,
      windows: windowCount
    };
  }

  private empty(): ProposalSet {
    return { explanation: "", proposals: [], rejected: [], tokensUsed: 0, windows: 0 };
  }

  async propose(request: AgentEditRequest, signal?: AbortSignal): Promise<ProposalSet> {
    const windows = this.plan(request);
    if (windows.length === 0) {
      return this.empty();
    }

    log.info("Agent edit round", {
      projectId: request.projectId,
      file: request.file,
      windows: windows.length,
      forceBatch: Boolean(request.forceBatch)
    });

    // Only a sequential run can show each window the edits of the windows before it.
    const sequential = this.deps.batch.concurrency <= 1;
    const completed: WindowResult[] = [];
    const controller = linkSignal(signal);
    try {
      const results = await mapWithConcurrency(windows, this.deps.batch.concurrency, controller, async (window, windowSignal) => {
        const result = await this.deps.service.invokeWindow(
          this.windowArgs(request, window, windows.length, windowSignal, sequential ? completed : [])
        );
        completed.push(result);
        return result;
      });
      if (signal?.aborted) {
        throw createAbortError();
      }
      return this.finish(request, results, windows.length);
    } catch (error) {
      if (signal?.aborted && !isAbortError(error)) {
        throw createAbortError();
      }
      throw error;
    }
  }

  /**
   * Streaming variant: windows run one after another so explanation text arrives in
   * document order. Edits are validated once, over the merged set.
   */
  async *proposeStreaming(request: AgentEditRequest, signal?: AbortSignal): AsyncGenerator<StreamWindowEvent, ProposalSet> {
    const windows = this.plan(request);
    if (windows.length === 0) {
      return this.empty();
    }

    const controller = linkSignal(signal);
    const results: WindowResult[] = [];
    let emittedAny = false;

    for (const window of windows) {
      let emittedInWindow = false;
      const stream = this.deps.service.streamWindow(
        this.windowArgs(request, window, windows.length, controller.signal, results)
      );
      for (;;) {
        const step = await stream.next();
        if (step.done) {
          results.push(step.value);
          break;
        }
        if (emittedAny && !emittedInWindow) {
          yield { type: "chunk", text: "\n\n" };
        }
        emittedInWindow = true;
        emittedAny = true;
        yield step.value;
      }
    }

    if (signal?.aborted) {
      throw createAbortError();
    }
    return this.finish(request, results, windows.length);
  }
}
