import { expect } from "chai";
import { describe, it } from "mocha";

import { discoverLocalServers } from "../../../services/backendDiscovery.js";

import type { RemoteBackend } from "../../../services/contracts.js";
import type { OpenAIModel } from "../../../types/openai.js";

const MODEL: OpenAIModel = { id: "llama-test", object: "model", created: 1, owned_by: "ollama" };

describe("discoverLocalServers", function () {
  it("lists the servers that answer and skips the rest", async function () {
    const asked: Array<[string, number]> = [];
    const found = await discoverLocalServers({
      selfPort: 9999,
      exclude: [],
      fetchModels: (remote: RemoteBackend, timeout: number) => {
        asked.push([remote.name, timeout]);
        return remote.name === "ollama" ? Promise.resolve([MODEL]) : Promise.reject(new Error("connect ECONNREFUSED"));
      },
    });

    expect(found).to.deep.equal([{ remote: { name: "ollama", baseUrl: "http://127.0.0.1:11434" }, models: [MODEL] }]);
    expect(asked).to.deep.equal([["ollama", 3_000], ["lmstudio", 3_000], ["jan", 3_000]]);
  });

  it("never lists its own port or a loopback URL already in use", async function () {
    const asked: string[] = [];
    const found = await discoverLocalServers({
      selfPort: 1234,
      exclude: ["http://localhost:11434", "http://cloud.test:1337", "not a url"],
      timeoutMs: 500,
      fetchModels: (remote: RemoteBackend) => {
        asked.push(remote.name);
        return Promise.resolve([]);
      },
    });

    expect(asked).to.deep.equal(["jan"]);
    expect(found.map((entry) => entry.remote.baseUrl)).to.deep.equal(["http://127.0.0.1:1337"]);
  });
});
