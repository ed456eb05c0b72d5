import { toAgentEditResponse } from "../editing/proposals.js";
import { ModelResponseInvalid, UpstreamModelError, isAbortError } from "../errors.js";
import { log } from "../logger.js";
import type { AgentEditRequest, AgentEditResponse, StreamEvent } from "../types.js";
import type { AgentEditPipeline } from "./agentEditPipeline.js";

export type StreamingState = "open" | "streaming_text" | "emitting_result" | "error" | "closed";

export interface StreamSink {
  send(event: StreamEvent): void;
  end(): void;
}

/**
 * open -> streaming_text -> emitting_result -> closed, or open|streaming_text ->
 * error -> closed. Exactly one terminal event (result or error) is ever sent;
 * anything offered after that is dropped. cancel() closes without a terminal event.
 */
export class StreamingSession {
  private current: StreamingState = "open";
  private readonly controller = new AbortController();
  private wasCancelled = false;

  constructor(private readonly sink: StreamSink) {}

  get state(): StreamingState {
    return this.current;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.wasCancelled;
  }

  private acceptsEvents(): boolean {
    return this.current === "open" || this.current === "streaming_text";
  }

  chunk(text: string): boolean {
    if (!this.acceptsEvents() || text.length === 0) {
      return false;
    }
    this.current = "streaming_text";
    this.sink.send({ type: "chunk", text });
    return true;
  }

  result(response: AgentEditResponse): boolean {
    if (!this.acceptsEvents()) {
      return false;
    }
    this.current = "emitting_result";
    this.sink.send({ type: "result", ...response });
    this.close();
    return true;
  }

  fail(message: string): boolean {
    if (!this.acceptsEvents()) {
      return false;
    }
    this.current = "error";
    this.sink.send({ type: "error", message });
    this.close();
    return true;
  }

  cancel(): void {
    if (this.current === "closed") {
      return;
    }
    this.wasCancelled = true;
    this.current = "closed";
    this.controller.abort();
  }

  private close(): void {
    this.current = "closed";
    this.sink.end();
  }
}

export function streamErrorMessage(error: unknown): string {
  if (error instanceof ModelResponseInvalid) {
    return "AI response could not be understood, please retry.";
  }
  if (error instanceof UpstreamModelError) {
    return `The AI service failed: ${error.message}`;
  }
  return "Failed to generate edits.";
}

export async function runStreamingEdit(
  pipeline: AgentEditPipeline,
  request: AgentEditRequest,
  session: StreamingSession
): Promise<void> {
  try {
    const rounds = pipeline.proposeStreaming(request, session.signal);
    for (;;) {
      const step = await rounds.next();
      if (session.cancelled) {
        log.info("Streaming edit cancelled, discarding result", { projectId: request.projectId });
        return;
      }
      if (step.done) {
        session.result(toAgentEditResponse(step.value));
        return;
      }
      session.chunk(step.value.text);
    }
  } catch (error) {
    if (session.cancelled) {
      log.info("Streaming edit aborted", { projectId: request.projectId, abort: isAbortError(error) });
      return;
    }
    log.caught("runStreamingEdit", error);
    session.fail(streamErrorMessage(error));
  }
}
