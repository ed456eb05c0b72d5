import { describe, expect, it } from "vitest";
import { ModelResponseInvalid, UpstreamModelError } from "../src/errors.js";
import {
  AgentEditService,
  ExplanationExtractor,
  buildAgentEditPrompt,
  extractJsonPayload,
  parseModelReply,
  type InvokeWindowArgs
} from "../src/services/agentEditService.js";
import { FakeModelClient, drain, replyJson, sequence, testModelSettings } from "./helpers.js";

function windowArgs(overrides: Partial<InvokeWindowArgs> = {}): InvokeWindowArgs {
  return {
    instruction: "Fix the typos",
    windowText: "Helo\nwrold",
    window: { chunkIndex: 0, firstLine: 1, lastLine: 2 },
    windowCount: 1,
    file: "main.tex",
    model: "test-pro",
    ...overrides
  };
}

const transient = (): UpstreamModelError =>
  new UpstreamModelError("dev request failed: overloaded", { provider: "dev", status: 503, transient: true });

describe("reply parsing", () => {
  it("pulls JSON out of a fenced block", () => {
    expect(extractJsonPayload('Sure:\n```json\n{"explanation":"x"}\n```')).toBe('{"explanation":"x"}');
  });

  it("coerces numeric strings and fills defaults", () => {
    expect(parseModelReply('{"changes":[{"start_line":"2","end_line":3,"original":"a"}]}')).toEqual({
      explanation: "",
      edits: [{ start_line: 2, end_line: 3, original: "a", replacement: "", reason: "" }]
    });
  });

  it("throws when there is no JSON object", () => {
    expect(() => parseModelReply("I cannot help with that")).toThrow("Model response did not contain JSON.");
  });
});

describe("buildAgentEditPrompt", () => {
  it("numbers lines and names the window of a batched file", () => {
    const prompt = buildAgentEditPrompt(
      windowArgs({
        windowText: "c\nd",
        window: { chunkIndex: 1, firstLine: 3, lastLine: 4 },
        windowCount: 2
      })
    );
    expect(prompt).toContain('You are seeing part 2 of 2 of "main.tex" (document lines 3-4).');
    expect(prompt).toContain("1| c\n2| d");
  });

  it("places the selection relative to the window", () => {
    const prompt = buildAgentEditPrompt(
      windowArgs({
        window: { chunkIndex: 0, firstLine: 11, lastLine: 20 },
        selection: { text: "wrold", startLine: 12, endLine: 12 }
      })
    );
    expect(prompt).toContain("The user selected (lines 2-2 of the text below):\nwrold");
  });
});

describe("AgentEditService.invokeWindow", () => {
  it("translates window-relative lines to document lines", async () => {
    const client = new FakeModelClient(
      sequence([
        replyJson({
          explanation: "Fixed spelling.",
          changes: [{ start_line: 1, end_line: 2, original: "Helo\nwrold", replacement: "Hello\nworld", reason: "typos" }]
        })
      ])
    );
    const service = new AgentEditService({ client, settings: testModelSettings });

    const result = await service.invokeWindow(windowArgs({ window: { chunkIndex: 1, firstLine: 11, lastLine: 12 }, windowCount: 2 }));

    expect(result.explanation).toBe("Fixed spelling.");
    expect(result.tokensUsed).toBe(10);
    expect(result.proposals).toHaveLength(1);
    expect(result.proposals[0]).toMatchObject({
      file: "main.tex",
      startLine: 11,
      endLine: 12,
      originalText: "Helo\nwrold",
      replacementText: "Hello\nworld",
      accepted: "undecided"
    });
  });

  it("asks once more for structured output after an unparseable reply", async () => {
    const client = new FakeModelClient(
      sequence([
        { text: "Here are my thoughts", tokensUsed: 3 },
        replyJson({ explanation: "ok", changes: [] }, 4)
      ])
    );
    const service = new AgentEditService({ client, settings: testModelSettings });

    const result = await service.invokeWindow(windowArgs());

    expect(client.requests).toHaveLength(2);
    expect(client.requests[1].prompt).toContain("PREVIOUS_INVALID_OUTPUT (for repair):\n<<<\nHere are my thoughts\n>>>");
    expect(result.tokensUsed).toBe(7);
  });

  it("gives up after the repair attempt also fails", async () => {
    const client = new FakeModelClient(
      sequence([
        { text: "not json", tokensUsed: 1 },
        { text: "still not json", tokensUsed: 1 }
      ])
    );
    const service = new AgentEditService({ client, settings: testModelSettings });

    const failure = await service.invokeWindow(windowArgs()).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ModelResponseInvalid);
    if (failure instanceof ModelResponseInvalid) {
      expect(failure.rawResponse).toBe("still not json");
    }
    expect(client.requests).toHaveLength(2);
  });

  it("retries transient upstream failures", async () => {
    const client = new FakeModelClient(sequence([transient(), replyJson({ explanation: "ok", changes: [] })]));
    const service = new AgentEditService({ client, settings: testModelSettings });

    const result = await service.invokeWindow(windowArgs());

    expect(result.explanation).toBe("ok");
    expect(client.calls).toBe(2);
  });

  it("stops after the configured number of retries", async () => {
    const client = new FakeModelClient(sequence([transient(), transient(), transient(), transient()]));
    const service = new AgentEditService({ client, settings: testModelSettings });

    await expect(service.invokeWindow(windowArgs())).rejects.toBeInstanceOf(UpstreamModelError);
    expect(client.calls).toBe(3);
  });

  it("does not retry permanent failures", async () => {
    const permanent = new UpstreamModelError("dev request failed: bad key", { provider: "dev", status: 401, transient: false });
    const client = new FakeModelClient(sequence([permanent]));
    const service = new AgentEditService({ client, settings: testModelSettings });

    await expect(service.invokeWindow(windowArgs())).rejects.toBe(permanent);
    expect(client.calls).toBe(1);
  });
});

describe("AgentEditService.streamWindow", () => {
  it("streams the explanation and returns the parsed edits", async () => {
    const client = new FakeModelClient(sequence([]), () => [
      '{"explanation":"Rena',
      'med x", "changes":[{"start_line":2,"end_line":2,"original":"wrold","replacement":"world","reason":"typo"}]}'
    ]);
    const service = new AgentEditService({ client, settings: testModelSettings });

    const { events, result } = await drain(
      service.streamWindow(windowArgs({ window: { chunkIndex: 0, firstLine: 5, lastLine: 6 } }))
    );

    expect(events).toEqual([
      { type: "chunk", text: "Rena" },
      { type: "chunk", text: "med x" }
    ]);
    expect(result.explanation).toBe("Renamed x");
    expect(result.tokensUsed).toBe(7);
    expect(result.proposals[0]).toMatchObject({ startLine: 6, endLine: 6, replacementText: "world" });
  });

  it("retries a transient failure that happens before any output", async () => {
    const client = new FakeModelClient(sequence([]), (_request, call) => {
      if (call === 0) {
        throw transient();
      }
      return ['{"explanation":"done","changes":[]}'];
    });
    const service = new AgentEditService({ client, settings: testModelSettings });

    const { events, result } = await drain(service.streamWindow(windowArgs()));

    expect(events).toEqual([{ type: "chunk", text: "done" }]);
    expect(result.proposals).toEqual([]);
    expect(client.calls).toBe(2);
  });
});

describe("ExplanationExtractor", () => {
  it("decodes escapes across chunk boundaries", () => {
    const extractor = new ExplanationExtractor();
    expect(extractor.feed('{"expla')).toBe("");
    expect(extractor.feed('nation": "Fix')).toBe("Fix");
    expect(extractor.feed(" typo\\")).toBe(" typo");
    expect(extractor.feed("ns \\u00")).toBe("\ns ");
    expect(extractor.feed('e9", "changes": []}')).toBe("é");
    expect(extractor.feed("more")).toBe("");
    expect(extractor.text()).toBe('{"explanation": "Fix typo\\ns \\u00e9", "changes": []}more');
  });
});
