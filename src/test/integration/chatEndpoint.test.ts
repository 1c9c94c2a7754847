import axios from "axios";
import { expect } from "chai";
import express from "express";
import { afterEach, describe, it } from "mocha";

import { createApp } from "../../server/app.js";
import { KeyedLock, PromptPrefixCache } from "../../services/promptCache/index.js";
import { RouterServiceImpl } from "../../services/routerService.js";
import {
  ScriptedBackend,
  createGenerationService,
  getSSEDataLines,
  listen,
  parseSSEChunks,
  pieceIncrements,
  waitFor,
} from "../utils/index.js";

import type { HandlerContext } from "../../handlers/handlerContext.js";
import type { GenerationRun, GenerationService, RemoteBackend } from "../../services/contracts.js";
import type { BackendGenerateParams, TokenIncrement } from "../../types/backend.js";
import type { OpenAIModelsListResponse, OpenAIResponse } from "../../types/openai.js";
import type { RunningServer } from "../utils/index.js";
import type { Readable } from "stream";

/** Yields one increment, then waits for the abort signal. */
class StallingBackend extends ScriptedBackend {
  override async *generate(params: BackendGenerateParams, signal: AbortSignal): AsyncGenerator<TokenIncrement> {
    this.generateCalls.push(params);
    yield { text: "Hel", isFinal: false };
    if (!signal.aborted) {
      await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
    }
  }
}

interface Harness {
  context: HandlerContext;
  lock: KeyedLock;
  runs: GenerationRun[];
}

function createHarness(backend: ScriptedBackend, overrides: Partial<HandlerContext> = {}, remotes: RemoteBackend[] = []): Harness {
  const lock = new KeyedLock();
  const service = createGenerationService(new PromptPrefixCache(lock));
  const runs: GenerationRun[] = [];
  const generation: GenerationService = {
    start: async (request, target, model, controller) => {
      const run = await service.start(request, target, model, controller);
      runs.push(run);
      return run;
    },
  };

  const router = new RouterServiceImpl({
    backends: [backend],
    defaultBackendId: backend.id,
    remotes,
    gatewayEnabled: remotes.length > 0,
    modelRefreshMs: 60_000,
    fetchModels: (remote) => Promise.resolve([{ id: "remote-model", object: "model", created: 1, owned_by: remote.name }]),
  });

  const context: HandlerContext = {
    router,
    generation,
    requestSettings: { defaults: { maxTokens: 64, stop: [] }, maxTopLogprobs: 20 },
    generationTimeoutMs: 60_000,
    connectionTimeout: 5_000,
    ...overrides,
  };
  return { context, lock, runs };
}

const MESSAGES = [{ role: "user", content: "Hi" }];

describe("Chat completions endpoint", function () {
  const servers: RunningServer[] = [];

  async function serve(handler: Parameters<typeof listen>[0]): Promise<string> {
    const server = await listen(handler);
    servers.push(server);
    return server.url;
  }

  afterEach(async function () {
    await Promise.all(servers.splice(0).map((server) => server.close()));
  });

  describe("local generation", function () {
    it("answers a valid request from the local backend", async function () {
      const backend = new ScriptedBackend();
      backend.script = pieceIncrements(["Hello", " there"]);
      const url = await serve(createApp(createHarness(backend).context));

      const response = await axios.post<OpenAIResponse>(`${url}/v1/chat/completions`, { messages: MESSAGES });

      expect(response.status).to.equal(200);
      expect(response.data.model).to.equal("test-model");
      expect(response.data.choices[0]?.message.content).to.equal("Hello there");
      expect(response.data.choices[0]?.finish_reason).to.equal("stop");
    });

    it("rejects an invalid payload with 400 before any backend is called", async function () {
      const backend = new ScriptedBackend();
      const url = await serve(createApp(createHarness(backend).context));

      const response = await axios.post<unknown>(
        `${url}/v1/chat/completions`,
        { model: "test-model", messages: "Hi" },
        { validateStatus: () => true },
      );

      expect(response.status).to.equal(400);
      expect(response.data).to.deep.equal({
        error: {
          message: "'messages' must be a non-empty array",
          type: "invalid_request_error",
          param: "messages",
          code: "invalid_value",
        },
      });
      expect(backend.generateCalls).to.have.length(0);
      expect(backend.allocated).to.have.length(0);
    });

    it("rejects malformed JSON with 400", async function () {
      const backend = new ScriptedBackend();
      const url = await serve(createApp(createHarness(backend).context));

      const response = await axios.post<unknown>(`${url}/v1/chat/completions`, "{\"model\":", {
        headers: { "Content-Type": "application/json" },
        transformRequest: [(data: unknown) => data],
        validateStatus: () => true,
      });

      expect(response.status).to.equal(400);
      expect(response.data).to.deep.equal({
        error: {
          message: "Request body is not valid JSON",
          type: "invalid_request_error",
          param: null,
          code: "invalid_value",
        },
      });
      expect(backend.generateCalls).to.have.length(0);
    });

    it("ends with length and frees the backend when generation times out", async function () {
      const backend = new StallingBackend();
      const harness = createHarness(backend, { generationTimeoutMs: 30 });
      const url = await serve(createApp(harness.context));

      const response = await axios.post<OpenAIResponse>(`${url}/v1/chat/completions`, { messages: MESSAGES });

      expect(response.data.choices[0]?.message.content).to.equal("Hel");
      expect(response.data.choices[0]?.finish_reason).to.equal("length");
      expect(harness.lock.queueLength(backend.id)).to.equal(0);
    });

    it("ends with length and frees the backend when the client disconnects", async function () {
      const backend = new StallingBackend();
      const harness = createHarness(backend);
      const url = await serve(createApp(harness.context));

      const response = await axios.post<Readable>(
        `${url}/v1/chat/completions`,
        { messages: MESSAGES, stream: true },
        { responseType: "stream" },
      );
      await new Promise<void>((resolve) => response.data.once("data", () => resolve()));
      response.data.destroy();

      await waitFor(() => harness.runs.length === 1 && harness.lock.queueLength(backend.id) === 0);
      expect(harness.runs[0]?.pipeline.summary().finishReason).to.equal("length");
    });
  });

  describe("gateway routing", function () {
    const FINAL_WITH_USAGE = JSON.stringify({
      id: "r1",
      object: "chat.completion.chunk",
      choices: [{ index: 0, delta: {}, finish_reason: "stop" }],
      usage: { prompt_tokens: 7, completion_tokens: 1, total_tokens: 8 },
    });
    const CONTENT = JSON.stringify({
      id: "r1",
      object: "chat.completion.chunk",
      choices: [{ index: 0, delta: { content: "Hi" }, finish_reason: null }],
    });

    async function startUpstream(events: readonly string[], received: unknown[]): Promise<RemoteBackend> {
      const upstream = express();
      upstream.post("/v1/chat/completions", express.json(), (req, res) => {
        received.push(req.body);
        res.setHeader("Content-Type", "text/event-stream");
        for (const event of events) {
          res.write(`data: ${event}\n\n`);
        }
        res.end();
      });
      upstream.post("/v1/embeddings", express.json(), (req, res) => {
        res.json({ authorization: req.headers.authorization ?? null, body: req.body });
      });
      return { name: "upstream", baseUrl: await serve(upstream), apiKey: "test-secret" };
    }

    it("relays a remote stream and adds timings to its last event", async function () {
      const received: unknown[] = [];
      const remote = await startUpstream([CONTENT, FINAL_WITH_USAGE, "[DONE]"], received);
      const backend = new ScriptedBackend();
      const url = await serve(createApp(createHarness(backend, {}, [remote]).context));

      const response = await axios.post<string>(
        `${url}/v1/chat/completions`,
        { model: "remote-model", messages: MESSAGES, stream: true },
        { responseType: "text" },
      );

      expect(received).to.deep.equal([{ model: "remote-model", messages: MESSAGES, stream: true }]);
      expect(backend.generateCalls).to.have.length(0);
      const lines = getSSEDataLines(response.data);
      expect(lines[0]).to.equal(`data: ${CONTENT}`);
      expect(lines[2]).to.equal("data: [DONE]");
      const last = parseSSEChunks(response.data)[1];
      expect(last?.choices[0]?.finish_reason).to.equal("stop");
      expect(last?.timings?.prompt_n).to.equal(7);
      expect(last?.timings?.predicted_n).to.equal(1);
      expect(last?.timings?.prompt_ms).to.be.at.least(0);
    });

    it("passes a remote stream that already has timings through unchanged", async function () {
      const withTimings = JSON.stringify({
        id: "r1",
        object: "chat.completion.chunk",
        choices: [{ index: 0, delta: {}, finish_reason: "stop" }],
        timings: { prompt_n: 3, prompt_ms: 1.5, predicted_n: 1, predicted_ms: 4 },
      });
      const remote = await startUpstream([CONTENT, withTimings, "[DONE]"], []);
      const url = await serve(createApp(createHarness(new ScriptedBackend(), {}, [remote]).context));

      const response = await axios.post<string>(
        `${url}/v1/chat/completions`,
        { model: "upstream/remote-model", messages: MESSAGES, stream: true },
        { responseType: "text" },
      );

      expect(response.data).to.equal(`data: ${CONTENT}\n\ndata: ${withTimings}\n\ndata: [DONE]\n\n`);
    });

    it("forwards other /v1 routes to the default remote with its key", async function () {
      const remote = await startUpstream([], []);
      const url = await serve(createApp(createHarness(new ScriptedBackend(), {}, [remote]).context));

      const response = await axios.post<unknown>(`${url}/v1/embeddings`, { input: "hello" });

      expect(response.data).to.deep.equal({ authorization: "Bearer test-secret", body: { input: "hello" } });
    });

    it("keeps serving the model list itself", async function () {
      const remote = await startUpstream([], []);
      const url = await serve(createApp(createHarness(new ScriptedBackend(), {}, [remote]).context));

      const response = await axios.get<OpenAIModelsListResponse>(`${url}/v1/models`);

      expect(response.data.data.map((model) => model.id)).to.deep.equal(["test-model", "remote-model"]);
    });
  });
});
