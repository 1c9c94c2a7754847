import { expect } from "chai";
import { describe, it } from "mocha";

import { PromptPrefixCache } from "../../services/promptCache/index.js";
import { RequestValidationError } from "../../utils/errors.js";
import {
  ScriptedBackend,
  WEATHER_TOOL,
  charIncrements,
  createGenerationService,
  makeRequest,
  pieceIncrements,
} from "../utils/index.js";

import type { GenerationRun } from "../../services/contracts.js";
import type { GenerationRequest, PipelineEvent } from "../../types/generation.js";

async function drain(run: GenerationRun): Promise<PipelineEvent[]> {
  const events: PipelineEvent[] = [];
  for await (const event of run.events()) {
    events.push(event);
  }
  return events;
}

async function startRun(backend: ScriptedBackend, request: GenerationRequest, controller = new AbortController()): Promise<GenerationRun> {
  return createGenerationService().start(request, backend, backend.model, controller);
}

describe("GenerationPipeline", function () {
  it("splits reasoning from content", async function () {
    const backend = new ScriptedBackend();
    backend.script = pieceIncrements(["<think>plan", "</think>", "Answer"]);

    const run = await startRun(backend, makeRequest());
    await drain(run);

    expect(run.pipeline.summary()).to.deep.equal({
      content: "Answer",
      reasoning: "plan",
      toolCalls: [],
      finishReason: "stop",
    });
  });

  it("never matches stop sequences inside reasoning", async function () {
    const backend = new ScriptedBackend();
    backend.script = pieceIncrements(["<think>END here</think>", "Hello END world", " never sent"]);
    const controller = new AbortController();

    const run = await startRun(backend, makeRequest({ stop: ["END"] }), controller);
    await drain(run);

    const summary = run.pipeline.summary();
    expect(summary.reasoning).to.equal("END here");
    expect(summary.content).to.equal("Hello ");
    expect(summary.finishReason).to.equal("stop");
    expect(controller.signal.aborted).to.equal(true);
  });

  it("turns a tagged call into a tool_call event", async function () {
    const backend = new ScriptedBackend();
    backend.script = charIncrements('<tool_call>{"name":"get_weather","arguments":{"city":"Paris"}}</tool_call>');

    const run = await startRun(backend, makeRequest({ tools: [WEATHER_TOOL] }));
    const events = await drain(run);

    const calls = events.filter((event) => event.type === "tool_call");
    expect(calls).to.have.length(1);
    const summary = run.pipeline.summary();
    expect(summary.content).to.equal("");
    expect(summary.finishReason).to.equal("tool_calls");
    expect(summary.toolCalls.map((call) => call.function)).to.deep.equal([
      { name: "get_weather", arguments: '{"city":"Paris"}' },
    ]);
    expect(backend.generateCalls[0]?.prompt).to.include("<tools>");
  });

  it("leaves call notation as text when tool_choice is none", async function () {
    const backend = new ScriptedBackend();
    const text = '<tool_call>{"name":"get_weather","arguments":{"city":"Paris"}}</tool_call>';
    backend.script = pieceIncrements([text]);

    const run = await startRun(backend, makeRequest({ tools: [WEATHER_TOOL], toolChoice: "none" }));
    await drain(run);

    expect(run.pipeline.summary().content).to.equal(text);
    expect(run.pipeline.summary().finishReason).to.equal("stop");
    expect(backend.generateCalls[0]?.prompt).to.not.include("<tools>");
  });

  it("releases guided JSON once, stripped of surrounding prose", async function () {
    const backend = new ScriptedBackend();
    backend.script = pieceIncrements(["Here: ", '{"a":', "1}", " done"]);

    const run = await startRun(backend, makeRequest({ responseFormat: { type: "json_object" } }));
    const events = await drain(run);

    expect(events).to.deep.equal([{ type: "content", text: '{"a":1}' }]);
  });

  it("reports length when the token budget runs out", async function () {
    const backend = new ScriptedBackend();
    backend.script = charIncrements("abc", "length");

    const run = await startRun(backend, makeRequest({ maxTokens: 3 }));
    await drain(run);

    expect(run.pipeline.summary().finishReason).to.equal("length");
    expect(run.pipeline.usage.completion).to.equal(3);
  });

  it("ends with length when aborted mid-generation", async function () {
    const backend = new ScriptedBackend();
    backend.script = charIncrements("abcdef");
    const controller = new AbortController();

    const run = await startRun(backend, makeRequest(), controller);
    for await (const event of run.events()) {
      if (event.type === "content") {
        controller.abort();
      }
    }

    expect(run.pipeline.summary().content).to.equal("a");
    expect(run.pipeline.summary().finishReason).to.equal("length");
  });

  it("invalidates the cache entry when the backend fails", async function () {
    const backend = new ScriptedBackend({ failWith: new Error("connection reset") });
    backend.script = [{ text: "Hi", isFinal: false }];
    const cache = new PromptPrefixCache();

    const run = await createGenerationService(cache).start(makeRequest(), backend, backend.model, new AbortController());
    try {
      await drain(run);
      expect.fail("events() should have thrown");
    } catch (error: unknown) {
      expect(error).to.be.instanceOf(Error);
      expect(error instanceof Error ? error.message : "").to.equal("connection reset");
    }

    expect(backend.invalidated).to.have.length(1);
    const promptTokens = await backend.tokenize(backend.generateCalls[0]?.prompt ?? "");
    const next = await cache.acquire(backend, backend.model, promptTokens);
    expect(next.cachedTokens).to.equal(0);
    next.release();
  });

  it("rejects logprobs on a backend without them", async function () {
    const backend = new ScriptedBackend({ id: "native", logprobs: false });
    try {
      await startRun(backend, makeRequest({ topLogprobs: 0 }));
      expect.fail("start should have thrown");
    } catch (error: unknown) {
      expect(error).to.be.instanceOf(RequestValidationError);
    }
    expect(backend.generateCalls).to.have.length(0);
  });
});
