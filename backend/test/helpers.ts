import type { Server } from "node:http";
import type { Express } from "express";
import type { ModelSettings } from "../src/config.js";
import type { ModelClient, ModelReply, ModelRequest, ModelStreamEvent } from "../src/services/aiService.js";
import type { EditProposal } from "../src/types.js";

export const testModelSettings: ModelSettings = {
  provider: "dev",
  requestedProvider: "dev",
  flashModel: "test-flash",
  proModel: "test-pro",
  maxOutputTokens: 1024,
  temperature: 0,
  timeoutMs: 1000,
  maxRetries: 2,
  retryBaseMs: 0
};

export function makeProposal(
  fields: Pick<EditProposal, "startLine" | "endLine" | "originalText" | "replacementText"> & Partial<EditProposal>
): EditProposal {
  return {
    id: `p-${fields.startLine}-${fields.endLine}`,
    file: "main.tex",
    reason: "",
    accepted: "accepted",
    ...fields
  };
}

export function replyJson(value: unknown, tokensUsed = 10): ModelReply {
  return { text: JSON.stringify(value), tokensUsed };
}

export type Respond = (request: ModelRequest, call: number) => ModelReply | Promise<ModelReply>;
// An Error entry is thrown at that point in the stream.
export type RespondStream = (request: ModelRequest, call: number) => Array<string | Error>;

export function sequence(items: Array<ModelReply | Error>): Respond {
  return (_request, call) => {
    const item = items[call];
    if (item === undefined) {
      throw new Error(`unexpected model call ${call}`);
    }
    if (item instanceof Error) {
      throw item;
    }
    return item;
  };
}

export class FakeModelClient implements ModelClient {
  readonly provider = "dev" as const;
  readonly requests: ModelRequest[] = [];
  private generateCalls = 0;
  private streamCalls = 0;

  constructor(
    private readonly respond: Respond,
    private readonly respondStream: RespondStream = () => {
      throw new Error("unexpected stream call");
    }
  ) {}

  get calls(): number {
    return this.generateCalls + this.streamCalls;
  }

  async generate(request: ModelRequest): Promise<ModelReply> {
    this.requests.push(request);
    const call = this.generateCalls;
    this.generateCalls += 1;
    return this.respond(request, call);
  }

  async *stream(request: ModelRequest): AsyncIterable<ModelStreamEvent> {
    this.requests.push(request);
    const call = this.streamCalls;
    this.streamCalls += 1;
    const chunks = this.respondStream(request, call);
    for (const item of chunks) {
      if (item instanceof Error) {
        throw item;
      }
      yield { type: "text", text: item };
    }
    yield { type: "usage", tokensUsed: 7 };
  }
}

export async function drain<T, R>(generator: AsyncGenerator<T, R>): Promise<{ events: T[]; result: R }> {
  const events: T[] = [];
  for (;;) {
    const step = await generator.next();
    if (step.done) {
      return { events, result: step.value };
    }
    events.push(step.value);
  }
}

export async function listen(app: Express): Promise<{ baseUrl: string; close: () => Promise<void> }> {
  const server = await new Promise<Server>((resolve) => {
    const started = app.listen(0, "127.0.0.1", () => resolve(started));
  });
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("server has no port");
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      })
  };
}
