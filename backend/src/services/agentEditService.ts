import { z } from "zod";
import type { ModelSettings } from "../config.js";
import { createProposal } from "../editing/proposals.js";
import {
  ModelResponseInvalid,
  UpstreamModelError,
  createAbortError,
  errorMessage,
  throwIfAborted
} from "../errors.js";
import { log } from "../logger.js";
import type { BatchWindow, EditProposal, ModelImage, RawEdit, SelectionContext, WindowResult } from "../types.js";
import type { ModelClient, ModelRequest } from "./aiService.js";
import { numberLines } from "./documentService.js";

export type InvokeWindowArgs = {
  instruction: string;
  windowText: string;
  window: BatchWindow;
  windowCount: number;
  file: string;
  model: string;
  selection?: SelectionContext;
  images?: ModelImage[];
  priorEdits?: EditProposal[];
  signal?: AbortSignal;
};

export type ParsedReply = {
  explanation: string;
  edits: RawEdit[];
};

const lineNumber = z.coerce.number().int();

const responseSchema = z.object({
  explanation: z.string().default(""),
  changes: z
    .array(
      z.object({
        start_line: lineNumber,
        end_line: lineNumber,
        original: z.string().default(""),
        replacement: z.string().default(""),
        reason: z.string().default("")
      })
    )
    .max(200)
    .default([])
});

const REPAIR_INSTRUCTION = [
  "IMPORTANT:",
  "Your previous output could not be parsed.",
  "Return valid structured output only: one JSON object in the exact format described above.",
  "No markdown, no commentary, no leading or trailing text."
].join("\n");

function describeSelection(selection: SelectionContext, window: BatchWindow): string {
  const insideWindow = selection.startLine >= window.firstLine && selection.endLine <= window.lastLine;
  const span = insideWindow
    ? `lines ${selection.startLine - window.firstLine + 1}-${selection.endLine - window.firstLine + 1} of the text below`
    : `document lines ${selection.startLine}-${selection.endLine}, outside the text below`;
  return [`The user selected (${span}):`, selection.text].join("\n");
}

const MAX_PRIOR_EDITS = 20;

function preview(text: string): string {
  return JSON.stringify(text.length > 80 ? `${text.slice(0, 80)}...` : text);
}

function describePriorEdits(edits: EditProposal[]): string {
  const shown = edits.slice(-MAX_PRIOR_EDITS);
  return [
    "Edits already proposed for earlier parts of this file (document line numbers). Do not propose them again:",
    ...shown.map(
      (edit) => `- lines ${edit.startLine}-${edit.endLine}: ${preview(edit.originalText)} -> ${preview(edit.replacementText)}`
    )
  ].join("\n");
}

export function buildAgentEditPrompt(args: InvokeWindowArgs, repair?: { previousOutput: string }): string {
  const parts = [
    "You are an AI agent that edits LaTeX documents.",
    "Carry out the user instruction with targeted line-range replacements. Never rewrite the whole document.",
    'Every line below is prefixed with its number as "N| ". start_line and end_line are inclusive and use those numbers.',
    '"original" must repeat the exact text of lines start_line..end_line, without the number prefixes.',
    '"replacement" is the complete new text for that range. Use an empty string to delete the range.',
    "Changes must not overlap each other.",
    "Output JSON only, with this exact format:",
    '{"explanation":"...","changes":[{"start_line":1,"end_line":1,"original":"...","replacement":"...","reason":"..."}]}',
    "If nothing needs to change, return an empty changes list."
  ];

  if (args.windowCount > 1) {
    parts.push(
      `You are seeing part ${args.window.chunkIndex + 1} of ${args.windowCount} of "${args.file}" ` +
        `(document lines ${args.window.firstLine}-${args.window.lastLine}). Only change lines shown here.`
    );
  }
  if (args.images && args.images.length > 0) {
    parts.push(`${args.images.length} image(s) are attached for reference.`);
  }

  if (args.priorEdits && args.priorEdits.length > 0) {
    parts.push("", describePriorEdits(args.priorEdits));
  }

  parts.push("", "User instruction:", args.instruction.trim());
  if (args.selection) {
    parts.push("", describeSelection(args.selection, args.window));
  }
  parts.push("", `Document (${args.file}):`, numberLines(args.windowText));

  if (repair) {
    parts.push("", REPAIR_INSTRUCTION, "", "PREVIOUS_INVALID_OUTPUT (for repair):", "<<<", repair.previousOutput.slice(0, 6000), ">>>");
  }

  return parts.join("\n");
}

export function extractJsonPayload(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.startsWith("{") && trimmed.endsWith("}")) {
    return trimmed;
  }

  const fenceMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenceMatch?.[1]) {
    return fenceMatch[1].trim();
  }

  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start >= 0 && end > start) {
    return trimmed.slice(start, end + 1);
  }

  throw new Error("Model response did not contain JSON.");
}

export function parseModelReply(raw: string): ParsedReply {
  const parsed = responseSchema.parse(JSON.parse(extractJsonPayload(raw)));
  return {
    explanation: parsed.explanation.trim(),
    edits: parsed.changes
  };
}

function tryParseReply(raw: string): { ok: true; reply: ParsedReply } | { ok: false; message: string } {
  try {
    return { ok: true, reply: parseModelReply(raw) };
  } catch (error) {
    return { ok: false, message: errorMessage(error) };
  }
}

export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(createAbortError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(createAbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Pulls the decoded value of the top-level "explanation" string out of a JSON reply
 * that is still arriving, so it can be shown before the reply is complete.
 */
export class ExplanationExtractor {
  private raw = "";
  private cursor = -1;
  private finished = false;

  feed(chunk: string): string {
    this.raw += chunk;
    if (this.finished) {
      return "";
    }
    if (this.cursor < 0) {
      const match = /"explanation"\s*:\s*"/.exec(this.raw);
      if (!match) {
        return "";
      }
      this.cursor = match.index + match[0].length;
    }

    let out = "";
    while (this.cursor < this.raw.length) {
      const ch = this.raw[this.cursor];
      if (ch === '"') {
        this.finished = true;
        break;
      }
      if (ch !== "\\") {
        out += ch;
        this.cursor += 1;
        continue;
      }

      const escaped = this.raw[this.cursor + 1];
      if (escaped === undefined) {
        break;
      }
      if (escaped === "u") {
        const hex = this.raw.slice(this.cursor + 2, this.cursor + 6);
        if (hex.length < 4) {
          break;
        }
        out += String.fromCharCode(Number.parseInt(hex, 16));
        this.cursor += 6;
        continue;
      }
      out += ESCAPES[escaped] ?? escaped;
      this.cursor += 2;
    }
    return out;
  }

  text(): string {
    return this.raw;
  }
}

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  b: "\b",
  f: "\f"
};

export type StreamWindowEvent = { type: "chunk"; text: string };

export type AgentEditServiceDeps = {
  client: ModelClient;
  settings: ModelSettings;
};

export class AgentEditService {
  constructor(private readonly deps: AgentEditServiceDeps) {}

  get provider(): string {
    return this.deps.client.provider;
  }

  private request(args: InvokeWindowArgs, prompt: string): ModelRequest {
    return {
      model: args.model,
      prompt,
      images: args.images,
      maxOutputTokens: this.deps.settings.maxOutputTokens,
      temperature: this.deps.settings.temperature
    };
  }

  /** Retries transient upstream failures with exponential backoff. */
  private async withTransientRetry<T>(label: string, signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
    const { maxRetries, retryBaseMs } = this.deps.settings;
    for (let attempt = 0; ; attempt += 1) {
      throwIfAborted(signal);
      try {
        return await fn();
      } catch (error) {
        if (!(error instanceof UpstreamModelError) || !error.transient || attempt >= maxRetries) {
          throw error;
        }
        const wait = retryBaseMs * 2 ** attempt;
        log.warn("Model call failed, retrying", { label, attempt, wait, message: error.message });
        await delay(wait, signal);
      }
    }
  }

  private toWindowResult(args: InvokeWindowArgs, reply: ParsedReply, tokensUsed: number): WindowResult {
    const offset = args.window.firstLine - 1;
    return {
      window: args.window,
      explanation: reply.explanation,
      proposals: reply.edits.map((edit) => createProposal(edit, args.file, offset)),
      tokensUsed
    };
  }

  private async repair(args: InvokeWindowArgs, previousOutput: string, tokensSoFar: number): Promise<WindowResult> {
    const label = `window ${args.window.chunkIndex}`;
    const reply = await this.withTransientRetry(label, args.signal, () =>
      this.deps.client.generate(this.request(args, buildAgentEditPrompt(args, { previousOutput })), args.signal)
    );
    const tokensUsed = tokensSoFar + reply.tokensUsed;
    const parsed = tryParseReply(reply.text);
    if (!parsed.ok) {
      log.error("Model reply still invalid after repair", { label, message: parsed.message });
      throw new ModelResponseInvalid(
        "AI response could not be understood, please retry.",
        reply.text
      );
    }
    return this.toWindowResult(args, parsed.reply, tokensUsed);
  }

  async invokeWindow(args: InvokeWindowArgs): Promise<WindowResult> {
    const label = `window ${args.window.chunkIndex}`;
    const startedAt = Date.now();
    const reply = await this.withTransientRetry(label, args.signal, () =>
      this.deps.client.generate(this.request(args, buildAgentEditPrompt(args)), args.signal)
    );

    const parsed = tryParseReply(reply.text);
    if (parsed.ok) {
      log.debug("Model reply parsed", {
        label,
        provider: this.deps.client.provider,
        model: args.model,
        edits: parsed.reply.edits.length,
        tokens: reply.tokensUsed,
        ms: Date.now() - startedAt
      });
      return this.toWindowResult(args, parsed.reply, reply.tokensUsed);
    }

    log.warn("Model reply could not be parsed, asking for structured output", { label, message: parsed.message });
    return this.repair(args, reply.text, reply.tokensUsed);
  }

  /**
   * Streams the explanation as it is generated and returns the parsed window result.
   * A transient failure is only retried while nothing has been emitted yet.
   */
  async *streamWindow(args: InvokeWindowArgs): AsyncGenerator<StreamWindowEvent, WindowResult> {
    const { maxRetries, retryBaseMs } = this.deps.settings;
    const label = `window ${args.window.chunkIndex}`;
    const request = this.request(args, buildAgentEditPrompt(args));

    for (let attempt = 0; ; attempt += 1) {
      throwIfAborted(args.signal);
      const extractor = new ExplanationExtractor();
      let emitted = false;
      let tokensUsed = 0;

      try {
        for await (const event of this.deps.client.stream(request, args.signal)) {
          if (event.type === "usage") {
            tokensUsed = event.tokensUsed;
            continue;
          }
          const text = extractor.feed(event.text);
          if (text) {
            emitted = true;
            yield { type: "chunk", text };
          }
        }
      } catch (error) {
        if (emitted || !(error instanceof UpstreamModelError) || !error.transient || attempt >= maxRetries) {
          throw error;
        }
        const wait = retryBaseMs * 2 ** attempt;
        log.warn("Model stream failed before output, retrying", { label, attempt, wait, message: error.message });
        await delay(wait, args.signal);
        continue;
      }

      const raw = extractor.text();
      const parsed = tryParseReply(raw);
      if (parsed.ok) {
        return this.toWindowResult(args, parsed.reply, tokensUsed);
      }
      log.warn("Streamed reply could not be parsed, asking for structured output", { label, message: parsed.message });
      return await this.repair(args, raw, tokensUsed);
    }
  }
}
