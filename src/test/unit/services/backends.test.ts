import { Readable } from "stream";

import axios, { AxiosError } from "axios";
import { expect } from "chai";
import { describe, it } from "mocha";

import { LlamaServerBackend, OllamaBackend, estimateTokens } from "../../../services/backends/index.js";
import { BackendRequestError } from "../../../utils/errors.js";

import type { LocalBackendConfig, TensorBackendConfig } from "../../../config.js";
import type { OllamaClient, OllamaGenerateChunk } from "../../../services/backends/index.js";
import type { BackendGenerateParams, TokenIncrement } from "../../../types/backend.js";
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import type { GenerateRequest } from "ollama";

const TENSOR_CONFIG: TensorBackendConfig = {
  enabled: true,
  baseUrl: "http://tensor.test",
  model: "qwen-test",
  alias: "tensor-alias",
  template: "chatml",
  modelType: null,
  toolCallParser: null,
  contextLength: 4096,
  slot: 2,
};

const NATIVE_CONFIG: LocalBackendConfig = {
  enabled: true,
  baseUrl: "http://native.test",
  model: "llama3.2:3b",
  alias: null,
  template: "llama3",
  modelType: null,
  toolCallParser: null,
  contextLength: 8192,
};

type Route = (config: InternalAxiosRequestConfig) => AxiosResponse | Promise<AxiosResponse>;

function fakeHttp(route: Route, calls: InternalAxiosRequestConfig[] = []): AxiosInstance {
  return axios.create({
    baseURL: TENSOR_CONFIG.baseUrl,
    adapter: async (config) => {
      calls.push(config);
      return route(config);
    },
  });
}

function respond(config: InternalAxiosRequestConfig, data: unknown, status = 200): AxiosResponse {
  return { data, status, statusText: "OK", headers: {}, config };
}

function sse(...payloads: unknown[]): Readable {
  return Readable.from(payloads.map((payload) => `data: ${JSON.stringify(payload)}\n\n`));
}

function requestBody(config: InternalAxiosRequestConfig | undefined): unknown {
  return JSON.parse(String(config?.data));
}

function generateParams(backend: { allocateState(model: string): BackendGenerateParams["state"] }, overrides: Partial<BackendGenerateParams> = {}): BackendGenerateParams {
  return {
    model: "qwen-test",
    prompt: "<|im_start|>user\nHi<|im_end|>\n",
    sampling: { temperature: 0.2 },
    maxTokens: 16,
    topLogprobs: null,
    state: backend.allocateState("qwen-test"),
    ...overrides,
  };
}

async function collect(source: AsyncIterable<TokenIncrement>): Promise<TokenIncrement[]> {
  const increments: TokenIncrement[] = [];
  for await (const increment of source) {
    increments.push(increment);
  }
  return increments;
}

describe("LlamaServerBackend", function () {
  it("tokenizes without special tokens", async function () {
    const calls: InternalAxiosRequestConfig[] = [];
    const backend = new LlamaServerBackend(TENSOR_CONFIG, {
      http: fakeHttp((config) => respond(config, { tokens: [15, 27, { id: 99, piece: "x" }] }), calls),
    });

    expect(await backend.tokenize("Hi")).to.deep.equal([15, 27, 99]);
    expect(calls[0]?.url).to.equal("/tokenize");
    expect(requestBody(calls[0])).to.deep.equal({ content: "Hi", add_special: false });
  });

  it("streams /completion into increments and reads the limit stop", async function () {
    const calls: InternalAxiosRequestConfig[] = [];
    const backend = new LlamaServerBackend(TENSOR_CONFIG, {
      http: fakeHttp((config) => respond(config, sse(
        { content: "Hel", stop: false },
        { content: "lo", stop: false },
        { content: "", stop: true, stop_type: "limit", tokens_predicted: 5 },
      )), calls),
    });

    const increments = await collect(backend.generate(generateParams(backend), new AbortController().signal));

    expect(increments).to.deep.equal([
      { text: "Hel", isFinal: false, tokenCount: 1 },
      { text: "lo", isFinal: false, tokenCount: 1 },
      { text: "", isFinal: true, tokenCount: 3, finishReason: "length" },
    ]);
    expect(calls[0]?.url).to.equal("/completion");
    expect(requestBody(calls[0])).to.deep.equal({
      prompt: "<|im_start|>user\nHi<|im_end|>\n",
      stream: true,
      n_predict: 16,
      cache_prompt: true,
      id_slot: 2,
      temperature: 0.2,
    });
  });

  it("maps completion_probabilities onto logprobs and asks for n_probs", async function () {
    const calls: InternalAxiosRequestConfig[] = [];
    const backend = new LlamaServerBackend(TENSOR_CONFIG, {
      http: fakeHttp((config) => respond(config, sse(
        {
          content: "Hi",
          stop: false,
          completion_probabilities: [{
            id: 1,
            token: "Hi",
            logprob: -0.1,
            bytes: [72, 105],
            top_logprobs: [
              { id: 1, token: "Hi", logprob: -0.1, bytes: [72, 105] },
              { id: 2, token: "Hey", logprob: -2.5, bytes: [72, 101, 121] },
            ],
          }],
        },
        { content: "", stop: true, stop_type: "eos" },
      )), calls),
    });

    const increments = await collect(backend.generate(generateParams(backend, { topLogprobs: 0 }), new AbortController().signal));

    expect(increments[0]?.logprobs).to.deep.equal([{
      token: "Hi",
      logprob: -0.1,
      bytes: [72, 105],
      topLogprobs: [
        { token: "Hi", logprob: -0.1, bytes: [72, 105] },
        { token: "Hey", logprob: -2.5, bytes: [72, 101, 121] },
      ],
    }]);
    expect(increments[1]).to.deep.equal({ text: "", isFinal: true, tokenCount: 0, finishReason: "stop" });
    expect(requestBody(calls[0])).to.have.property("n_probs", 1);
  });

  it("reads the legacy probs shape", async function () {
    const backend = new LlamaServerBackend(TENSOR_CONFIG, {
      http: fakeHttp((config) => respond(config, sse(
        { content: "a", stop: false, completion_probabilities: [{ content: "a", probs: [{ tok_str: "a", prob: 1 }] }] },
        { content: "", stop: true },
      ))),
    });

    const increments = await collect(backend.generate(generateParams(backend, { topLogprobs: 1 }), new AbortController().signal));

    expect(increments[0]?.logprobs).to.deep.equal([{
      token: "a",
      logprob: 0,
      bytes: [97],
      topLogprobs: [{ token: "a", logprob: 0, bytes: [97] }],
    }]);
  });

  it("passes the server's timings on with the final increment", async function () {
    const backend = new LlamaServerBackend(TENSOR_CONFIG, {
      http: fakeHttp((config) => respond(config, sse(
        { content: "Hi", stop: false },
        {
          content: "",
          stop: true,
          timings: { prompt_n: 5, prompt_ms: 12.5, predicted_n: 1, predicted_ms: 30, predicted_per_second: 33.3 },
        },
      ))),
    });

    const increments = await collect(backend.generate(generateParams(backend), new AbortController().signal));

    expect(increments[0]?.timings).to.equal(undefined);
    expect(increments[1]?.timings).to.deep.equal({ promptTokens: 5, promptMs: 12.5, predictedTokens: 1, predictedMs: 30 });
  });

  it("erases its slot on invalidation", async function () {
    const calls: InternalAxiosRequestConfig[] = [];
    const backend = new LlamaServerBackend(TENSOR_CONFIG, { http: fakeHttp((config) => respond(config, {}), calls) });

    await backend.invalidateState(backend.allocateState("qwen-test"));

    expect(calls[0]?.url).to.equal("/slots/2");
    expect(calls[0]?.params).to.deep.equal({ action: "erase" });
  });

  it("continues when the server refuses slot erasure", async function () {
    const backend = new LlamaServerBackend(TENSOR_CONFIG, {
      http: fakeHttp((config) => {
        throw new AxiosError("Request failed with status code 501", "ERR_BAD_RESPONSE", config, null, respond(config, "slots disabled", 501));
      }),
    });

    await backend.invalidateState(backend.allocateState("qwen-test"));
  });

  it("reports a refused connection as 503", async function () {
    const backend = new LlamaServerBackend(TENSOR_CONFIG, {
      http: fakeHttp(() => { throw new Error("connect ECONNREFUSED 127.0.0.1:8080"); }),
    });

    try {
      await collect(backend.generate(generateParams(backend), new AbortController().signal));
      expect.fail("generate should have thrown");
    } catch (error: unknown) {
      expect(error).to.be.instanceOf(BackendRequestError);
      if (error instanceof BackendRequestError) {
        expect(error.status).to.equal(503);
        expect(error.message).to.equal("Backend 'tensor' failed: connect ECONNREFUSED 127.0.0.1:8080");
      }
    }
    expect(await backend.health()).to.equal(false);
  });

  it("yields nothing once the signal has fired", async function () {
    const calls: InternalAxiosRequestConfig[] = [];
    const backend = new LlamaServerBackend(TENSOR_CONFIG, { http: fakeHttp((config) => respond(config, sse()), calls) });
    const controller = new AbortController();
    controller.abort();

    expect(await collect(backend.generate(generateParams(backend), controller.signal))).to.deep.equal([]);
    expect(calls).to.have.length(0);
  });
});

class FakeOllamaClient implements OllamaClient {
  readonly requests: Array<GenerateRequest & { stream: true }> = [];
  aborted = false;

  constructor(
    private readonly chunks: OllamaGenerateChunk[],
    private readonly installed: string[] = ["llama3.2:3b"],
  ) {}

  generate(request: GenerateRequest & { stream: true }): Promise<AsyncIterable<OllamaGenerateChunk> & { abort(): void }> {
    this.requests.push(request);
    const { chunks } = this;
    return Promise.resolve({
      async *[Symbol.asyncIterator](): AsyncGenerator<OllamaGenerateChunk> {
        for (const chunk of chunks) {
          await Promise.resolve();
          yield chunk;
        }
      },
      abort: (): void => { this.aborted = true; },
    });
  }

  list(): Promise<{ models: Array<{ name: string }> }> {
    return Promise.resolve({ models: this.installed.map((name) => ({ name })) });
  }
}

describe("OllamaBackend", function () {
  it("sends the rendered prompt raw with mapped options", async function () {
    const client = new FakeOllamaClient([
      { response: "Hi", done: false },
      { response: "", done: true, done_reason: "length" },
    ]);
    const backend = new OllamaBackend(NATIVE_CONFIG, { client });

    const increments = await collect(backend.generate(
      generateParams(backend, { model: "llama3.2:3b", sampling: { temperature: 0.5, minP: 0.1, seed: 7 } }),
      new AbortController().signal,
    ));

    expect(increments).to.deep.equal([
      { text: "Hi", isFinal: false },
      { text: "", isFinal: true, finishReason: "length" },
    ]);
    expect(client.requests[0]).to.deep.equal({
      model: "llama3.2:3b",
      prompt: "<|im_start|>user\nHi<|im_end|>\n",
      raw: true,
      stream: true,
      options: { num_predict: 16, num_ctx: 8192, temperature: 0.5, seed: 7 },
    });
  });

  it("settles the token count and timings from the final chunk", async function () {
    const client = new FakeOllamaClient([
      { response: "Hel", done: false },
      { response: "lo", done: false },
      {
        response: "",
        done: true,
        done_reason: "stop",
        prompt_eval_count: 9,
        prompt_eval_duration: 4_000_000,
        eval_count: 3,
        eval_duration: 60_000_000,
      },
    ]);
    const backend = new OllamaBackend(NATIVE_CONFIG, { client });

    const increments = await collect(backend.generate(generateParams(backend), new AbortController().signal));

    expect(increments[2]).to.deep.equal({
      text: "",
      isFinal: true,
      finishReason: "stop",
      tokenCount: 1,
      timings: { promptTokens: 9, promptMs: 4, predictedTokens: 3, predictedMs: 60 },
    });
  });

  it("is healthy only when the model is installed", async function () {
    expect(await new OllamaBackend(NATIVE_CONFIG, { client: new FakeOllamaClient([]) }).health()).to.equal(true);
    expect(await new OllamaBackend(NATIVE_CONFIG, { client: new FakeOllamaClient([], ["llama3.2:3b:latest"]) }).health()).to.equal(true);
    expect(await new OllamaBackend(NATIVE_CONFIG, { client: new FakeOllamaClient([], ["mistral"]) }).health()).to.equal(false);
  });

  it("holds no slot", function () {
    const backend = new OllamaBackend(NATIVE_CONFIG, { client: new FakeOllamaClient([]) });
    expect(backend.allocateState("llama3.2:3b")).to.deep.equal({ backendId: "native", model: "llama3.2:3b", slot: null });
  });
});

describe("estimateTokens", function () {
  it("gives shared text prefixes shared token prefixes", function () {
    const first = estimateTokens("Hello world");
    const second = estimateTokens("Hello there");

    expect(first).to.have.length(4);
    expect(second.slice(0, 2)).to.deep.equal(first.slice(0, 2));
    expect(second[2]).to.not.equal(first[2]);
  });

  it("is empty for empty text", function () {
    expect(estimateTokens("")).to.deep.equal([]);
  });
});
