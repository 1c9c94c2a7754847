import { expect } from "chai";
import { describe, it } from "mocha";

import { buildGenerationRequest, mergeStopSequences } from "../../../handlers/payloadHandler.js";
import { RequestValidationError } from "../../../utils/errors.js";

import type { RequestSettings } from "../../../handlers/payloadHandler.js";

const SETTINGS: RequestSettings = {
  defaults: { temperature: 0.7, maxTokens: 4096, stop: ["<|im_end|>"] },
  maxTopLogprobs: 20,
};

const MESSAGES = [{ role: "user", content: "hi" }];

function expectRejected(body: Record<string, unknown>, param: string | null): void {
  let caught: unknown;
  try {
    buildGenerationRequest(body, SETTINGS);
  } catch (error: unknown) {
    caught = error;
  }
  expect(caught).to.be.instanceOf(RequestValidationError);
  if (caught instanceof RequestValidationError) {
    expect(caught.status).to.equal(400);
    expect(caught.param).to.equal(param);
  }
}

describe("buildGenerationRequest", function () {
  it("fills omitted fields from the defaults", function () {
    const request = buildGenerationRequest({ messages: MESSAGES }, SETTINGS);
    expect(request.model).to.equal(null);
    expect(request.sampling).to.deep.equal({ temperature: 0.7 });
    expect(request.maxTokens).to.equal(4096);
    expect(request.stop).to.deep.equal(["<|im_end|>"]);
    expect(request.toolChoice).to.equal("none");
    expect(request.stream).to.equal(false);
    expect(request.includeUsage).to.equal(false);
    expect(request.topLogprobs).to.equal(null);
    expect(Object.isFrozen(request)).to.equal(true);
  });

  it("lets request values override the defaults", function () {
    const request = buildGenerationRequest({
      model: "foundation",
      messages: MESSAGES,
      temperature: 0,
      top_k: 40,
      repeat_penalty: 1.1,
      seed: 7,
      max_completion_tokens: 32,
      stream: true,
      stream_options: { include_usage: true },
    }, SETTINGS);

    expect(request.model).to.equal("foundation");
    expect(request.sampling).to.deep.equal({ temperature: 0, topK: 40, repetitionPenalty: 1.1, seed: 7 });
    expect(request.maxTokens).to.equal(32);
    expect(request.stream).to.equal(true);
    expect(request.includeUsage).to.equal(true);
  });

  it("flattens text content parts", function () {
    const request = buildGenerationRequest({
      messages: [{ role: "user", content: [{ type: "text", text: "a" }, { type: "text", text: "b" }] }],
    }, SETTINGS);
    expect(request.messages[0]?.content).to.deep.equal([{ type: "text", text: "a" }, { type: "text", text: "b" }]);
  });

  it("defaults tool_choice to auto when tools are given", function () {
    const request = buildGenerationRequest({
      messages: MESSAGES,
      tools: [{ type: "function", function: { name: "f", parameters: { type: "object", properties: { x: { type: "integer" } } } } }],
    }, SETTINGS);
    expect(request.toolChoice).to.equal("auto");
    expect(request.tools[0]?.function.parameters).to.deep.equal({ type: "object", properties: { x: { type: "integer" } } });
  });

  it("defaults top_logprobs to 0 when only logprobs is set", function () {
    expect(buildGenerationRequest({ messages: MESSAGES, logprobs: true }, SETTINGS).topLogprobs).to.equal(0);
    expect(buildGenerationRequest({ messages: MESSAGES, logprobs: true, top_logprobs: 5 }, SETTINGS).topLogprobs).to.equal(5);
  });

  it("parses a json_schema response format", function () {
    const request = buildGenerationRequest({
      messages: MESSAGES,
      response_format: { type: "json_schema", json_schema: { name: "city", schema: { type: "object" } } },
    }, SETTINGS);
    expect(request.responseFormat).to.deep.equal({ type: "json_schema", json_schema: { schema: { type: "object" }, name: "city" } });
  });

  describe("rejects", function () {
    const cases: Array<{ name: string; body: Record<string, unknown>; param: string | null }> = [
      { name: "missing messages", body: {}, param: "messages" },
      { name: "empty messages", body: { messages: [] }, param: "messages" },
      { name: "an unknown role", body: { messages: [{ role: "robot", content: "x" }] }, param: "messages[0].role" },
      { name: "image content", body: { messages: [{ role: "user", content: [{ type: "image_url", image_url: {} }] }] }, param: "messages[0].content" },
      { name: "temperature above 2", body: { messages: MESSAGES, temperature: 2.5 }, param: "temperature" },
      { name: "top_p of 0", body: { messages: MESSAGES, top_p: 0 }, param: "top_p" },
      { name: "a fractional top_k", body: { messages: MESSAGES, top_k: 1.5 }, param: "top_k" },
      { name: "a negative top_k", body: { messages: MESSAGES, top_k: -1 }, param: "top_k" },
      { name: "min_p above 1", body: { messages: MESSAGES, min_p: 1.5 }, param: "min_p" },
      { name: "max_tokens of 0", body: { messages: MESSAGES, max_tokens: 0 }, param: "max_tokens" },
      { name: "greedy top_k with top_p", body: { messages: MESSAGES, top_k: 1, top_p: 0.9 }, param: "top_p" },
      { name: "a numeric stop", body: { messages: MESSAGES, stop: 5 }, param: "stop" },
      { name: "top_logprobs over the ceiling", body: { messages: MESSAGES, logprobs: true, top_logprobs: 21 }, param: "top_logprobs" },
      { name: "top_logprobs without logprobs", body: { messages: MESSAGES, top_logprobs: 2 }, param: "top_logprobs" },
      { name: "an unknown response_format", body: { messages: MESSAGES, response_format: { type: "yaml" } }, param: "response_format.type" },
      { name: "json_schema without a schema", body: { messages: MESSAGES, response_format: { type: "json_schema", json_schema: {} } }, param: "response_format.json_schema" },
      { name: "a tool_choice naming an unknown tool", body: { messages: MESSAGES, tool_choice: { type: "function", function: { name: "f" } } }, param: "tool_choice" },
      { name: "disagreeing max_tokens aliases", body: { messages: MESSAGES, max_tokens: 5, max_completion_tokens: 6 }, param: "max_tokens" },
    ];

    cases.forEach(({ name, body, param }) => {
      it(name, function () {
        expectRejected(body, param);
      });
    });
  });
});

describe("mergeStopSequences", function () {
  it("puts request stops first and removes duplicates and empty strings", function () {
    expect(mergeStopSequences(["b", "", "a"], ["a", "c"])).to.deep.equal(["b", "a", "c"]);
  });

  it("treats a string as a one-element list", function () {
    expect(mergeStopSequences("END", [])).to.deep.equal(["END"]);
  });
});
