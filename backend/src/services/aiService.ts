import Anthropic from "@anthropic-ai/sdk";
import { FinishReason, GoogleGenerativeAI, type Part } from "@google/generative-ai";
import { z } from "zod";
import type { ModelSettings } from "../config.js";
import { UpstreamModelError, isAbortError, type ModelProviderName } from "../errors.js";
import type { ModelImage } from "../types.js";

export type ModelRequest = {
  model: string;
  prompt: string;
  images?: ModelImage[];
  maxOutputTokens: number;
  temperature: number;
};

export type ModelReply = {
  text: string;
  tokensUsed: number;
};

export type ModelStreamEvent = { type: "text"; text: string } | { type: "usage"; tokensUsed: number };

export interface ModelClient {
  readonly provider: ModelProviderName;
  generate(request: ModelRequest, signal?: AbortSignal): Promise<ModelReply>;
  stream(request: ModelRequest, signal?: AbortSignal): AsyncIterable<ModelStreamEvent>;
}

function readStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

/**
 * 408, 5xx and plain rate limiting are worth another attempt. Auth failures and
 * exhausted quotas are not.
 */
export function isTransientStatus(status: number | undefined, message: string): boolean {
  if (status === undefined) {
    return true;
  }
  if (status === 429) {
    return !/quota|billing/i.test(message);
  }
  return status === 408 || status >= 500;
}

export function toUpstreamError(provider: ModelProviderName, error: unknown): unknown {
  if (error instanceof UpstreamModelError || isAbortError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const status = readStatus(error);
  return new UpstreamModelError(`${provider} request failed: ${message}`, {
    provider,
    status,
    transient: isTransientStatus(status, message)
  });
}

function truncatedError(provider: ModelProviderName, tokensUsed: number): UpstreamModelError {
  return new UpstreamModelError(
    `Response exceeded the output token limit (${tokensUsed} tokens used). Try a shorter document or a simpler instruction.`,
    { provider, transient: false }
  );
}

class GeminiModelClient implements ModelClient {
  readonly provider = "gemini" as const;
  private readonly client: GoogleGenerativeAI;

  constructor(apiKey: string, private readonly timeoutMs: number) {
    this.client = new GoogleGenerativeAI(apiKey);
  }

  private modelFor(request: ModelRequest) {
    return this.client.getGenerativeModel({
      model: request.model,
      generationConfig: {
        temperature: request.temperature,
        maxOutputTokens: request.maxOutputTokens,
        topP: 0.8,
        topK: 40
      }
    });
  }

  private parts(request: ModelRequest): Part[] {
    const images: Part[] = (request.images ?? []).map((image) => ({
      inlineData: { mimeType: image.mimeType, data: image.data }
    }));
    return [{ text: request.prompt }, ...images];
  }

  async generate(request: ModelRequest, signal?: AbortSignal): Promise<ModelReply> {
    try {
      const result = await this.modelFor(request).generateContent(
        { contents: [{ role: "user", parts: this.parts(request) }] },
        { signal, timeout: this.timeoutMs }
      );
      const response = result.response;
      const tokensUsed = response.usageMetadata?.totalTokenCount ?? 0;
      if (response.candidates?.[0]?.finishReason === FinishReason.MAX_TOKENS) {
        throw truncatedError(this.provider, tokensUsed);
      }
      const text = response.text();
      if (!text) {
        throw new UpstreamModelError("Gemini returned an empty response.", {
          provider: this.provider,
          transient: true
        });
      }
      return { text, tokensUsed };
    } catch (error) {
      throw toUpstreamError(this.provider, error);
    }
  }

  async *stream(request: ModelRequest, signal?: AbortSignal): AsyncIterable<ModelStreamEvent> {
    try {
      const result = await this.modelFor(request).generateContentStream(
        { contents: [{ role: "user", parts: this.parts(request) }] },
        { signal, timeout: this.timeoutMs }
      );
      for await (const chunk of result.stream) {
        const text = chunk.text();
        if (text) {
          yield { type: "text", text };
        }
      }
      const response = await result.response;
      const tokensUsed = response.usageMetadata?.totalTokenCount ?? 0;
      if (response.candidates?.[0]?.finishReason === FinishReason.MAX_TOKENS) {
        throw truncatedError(this.provider, tokensUsed);
      }
      yield { type: "usage", tokensUsed };
    } catch (error) {
      throw toUpstreamError(this.provider, error);
    }
  }
}

class AnthropicModelClient implements ModelClient {
  readonly provider = "anthropic" as const;
  private readonly client: Anthropic;

  constructor(apiKey: string, timeoutMs: number) {
    // Retries are handled by the edit service so they are logged and counted once.
    this.client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 0 });
  }

  private content(request: ModelRequest) {
    return [
      ...(request.images ?? []).map((image) => ({
        type: "image" as const,
        source: { type: "base64" as const, media_type: image.mimeType, data: image.data }
      })),
      { type: "text" as const, text: request.prompt }
    ];
  }

  async generate(request: ModelRequest, signal?: AbortSignal): Promise<ModelReply> {
    try {
      const response = await this.client.messages.create(
        {
          model: request.model,
          max_tokens: request.maxOutputTokens,
          temperature: request.temperature,
          messages: [{ role: "user", content: this.content(request) }]
        },
        { signal }
      );
      const tokensUsed = response.usage.input_tokens + response.usage.output_tokens;
      if (response.stop_reason === "max_tokens") {
        throw truncatedError(this.provider, tokensUsed);
      }
      const text = response.content.flatMap((item) => (item.type === "text" ? [item.text] : [])).join("\n");
      return { text, tokensUsed };
    } catch (error) {
      throw toUpstreamError(this.provider, error);
    }
  }

  async *stream(request: ModelRequest, signal?: AbortSignal): AsyncIterable<ModelStreamEvent> {
    try {
      const events = await this.client.messages.create(
        {
          model: request.model,
          max_tokens: request.maxOutputTokens,
          temperature: request.temperature,
          messages: [{ role: "user", content: this.content(request) }],
          stream: true
        },
        { signal }
      );

      let inputTokens = 0;
      let outputTokens = 0;
      for await (const event of events) {
        if (event.type === "message_start") {
          inputTokens = event.message.usage.input_tokens;
        } else if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
          yield { type: "text", text: event.delta.text };
        } else if (event.type === "message_delta") {
          outputTokens = event.usage.output_tokens;
          if (event.delta.stop_reason === "max_tokens") {
            throw truncatedError(this.provider, inputTokens + outputTokens);
          }
        }
      }
      yield { type: "usage", tokensUsed: inputTokens + outputTokens };
    } catch (error) {
      throw toUpstreamError(this.provider, error);
    }
  }
}

const openRouterReplySchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).nullish() }))
    .default([]),
  usage: z.object({ total_tokens: z.number() }).nullish()
});

const openRouterChunkSchema = z.object({
  choices: z
    .array(z.object({ delta: z.object({ content: z.string().nullish() }).nullish() }))
    .default([]),
  usage: z.object({ total_tokens: z.number() }).nullish()
});

// Keep-alive comments and partial frames are skipped rather than failing the stream.
function parseJsonOrNull(data: string): unknown {
  try {
    return JSON.parse(data);
  } catch {
    return null;
  }
}

function linkTimeout(signal: AbortSignal | undefined, timeoutMs: number): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`Timed out after ${timeoutMs}ms`)), timeoutMs);
  const onAbort = (): void => controller.abort(signal?.reason);
  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  };
}

class OpenRouterModelClient implements ModelClient {
  readonly provider = "openrouter" as const;

  constructor(private readonly apiKey: string, private readonly timeoutMs: number) {}

  private body(request: ModelRequest, stream: boolean): string {
    const images = (request.images ?? []).map((image) => ({
      type: "image_url",
      image_url: { url: `data:${image.mimeType};base64,${image.data}` }
    }));
    return JSON.stringify({
      model: request.model,
      temperature: request.temperature,
      max_tokens: request.maxOutputTokens,
      stream,
      messages: [
        {
          role: "user",
          content: images.length > 0 ? [{ type: "text", text: request.prompt }, ...images] : request.prompt
        }
      ]
    });
  }

  private async post(request: ModelRequest, stream: boolean, signal: AbortSignal): Promise<Response> {
    const response = await fetch("https://openrouter.ai/api/v1/chat/completions", {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`
      },
      body: this.body(request, stream),
      signal
    });

    if (!response.ok) {
      const body = await response.text();
      throw new UpstreamModelError(`OpenRouter request failed: ${response.status} ${body}`, {
        provider: this.provider,
        status: response.status,
        transient: isTransientStatus(response.status, body)
      });
    }
    return response;
  }

  async generate(request: ModelRequest, signal?: AbortSignal): Promise<ModelReply> {
    const linked = linkTimeout(signal, this.timeoutMs);
    try {
      const response = await this.post(request, false, linked.signal);
      const body = openRouterReplySchema.parse(await response.json());
      const text = body.choices[0]?.message?.content;
      if (!text) {
        throw new UpstreamModelError("OpenRouter returned an empty response.", {
          provider: this.provider,
          transient: true
        });
      }
      return { text, tokensUsed: body.usage?.total_tokens ?? 0 };
    } catch (error) {
      throw toUpstreamError(this.provider, error);
    } finally {
      linked.dispose();
    }
  }

  async *stream(request: ModelRequest, signal?: AbortSignal): AsyncIterable<ModelStreamEvent> {
    const linked = linkTimeout(signal, this.timeoutMs);
    try {
      const response = await this.post(request, true, linked.signal);
      const reader = response.body?.getReader();
      if (!reader) {
        throw new UpstreamModelError("OpenRouter returned no response body.", {
          provider: this.provider,
          transient: true
        });
      }

      const decoder = new TextDecoder();
      let buffer = "";
      let tokensUsed = 0;
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split("\n");
        buffer = lines.pop() ?? "";

        for (const line of lines) {
          if (!line.startsWith("data: ")) {
            continue;
          }
          const data = line.slice(6).trim();
          if (data === "[DONE]") {
            yield { type: "usage", tokensUsed };
            return;
          }
          const parsed = openRouterChunkSchema.safeParse(parseJsonOrNull(data));
          if (!parsed.success) {
            continue;
          }
          const text = parsed.data.choices[0]?.delta?.content;
          if (text) {
            yield { type: "text", text };
          }
          if (parsed.data.usage) {
            tokensUsed = parsed.data.usage.total_tokens;
          }
        }
      }
      yield { type: "usage", tokensUsed };
    } catch (error) {
      throw toUpstreamError(this.provider, error);
    } finally {
      linked.dispose();
    }
  }
}

/**
 * Stands in for a real provider when no API key is configured, so the editor stays
 * usable offline. It never proposes edits.
 */
export class DevModelClient implements ModelClient {
  readonly provider = "dev" as const;

  private reply(): string {
    return JSON.stringify({
      explanation: "Development mode: no model provider is configured, so no edits were proposed.",
      changes: []
    });
  }

  async generate(): Promise<ModelReply> {
    return { text: this.reply(), tokensUsed: 0 };
  }

  async *stream(): AsyncIterable<ModelStreamEvent> {
    const text = this.reply();
    for (let index = 0; index < text.length; index += 24) {
      yield { type: "text", text: text.slice(index, index + 24) };
    }
    yield { type: "usage", tokensUsed: 0 };
  }
}

export function createModelClient(settings: ModelSettings): ModelClient {
  const apiKey = settings.apiKey;
  if (settings.provider === "dev" || !apiKey) {
    return new DevModelClient();
  }
  if (settings.provider === "anthropic") {
    return new AnthropicModelClient(apiKey, settings.timeoutMs);
  }
  if (settings.provider === "openrouter") {
    return new OpenRouterModelClient(apiKey, settings.timeoutMs);
  }
  return new GeminiModelClient(apiKey, settings.timeoutMs);
}
