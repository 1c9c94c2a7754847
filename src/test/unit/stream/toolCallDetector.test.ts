import { expect } from "chai";
import { describe, it } from "mocha";

import { ToolCallDetector } from "../../../handlers/stream/components/ToolCallDetector.js";
import { createToolCallParser } from "../../../parsers/toolcalls/index.js";

import type { DetectorOutput } from "../../../handlers/stream/components/ToolCallDetector.js";
import type { ToolCallFormat } from "../../../parsers/toolcalls/index.js";
import type { OpenAITool } from "../../../types/openai.js";

const TOOLS: OpenAITool[] = [
  {
    type: "function",
    function: {
      name: "get_weather",
      parameters: { type: "object", properties: { city: { type: "string" } }, required: ["city"] },
    },
  },
];

function detector(format: ToolCallFormat = "json", maxBufferSize = 4096): ToolCallDetector {
  return new ToolCallDetector({ parser: createToolCallParser(format), tools: TOOLS, maxBufferSize });
}

function drain(subject: ToolCallDetector, pieces: readonly string[]): DetectorOutput[] {
  const outputs: DetectorOutput[] = [];
  for (const piece of pieces) {
    outputs.push(...subject.push(piece));
  }
  outputs.push(...subject.flush());
  return outputs;
}

function textOf(outputs: readonly DetectorOutput[]): string {
  return outputs.map((output) => (output.kind === "text" ? output.text : "")).join("");
}

function callsOf(outputs: readonly DetectorOutput[]): Array<{ name: string; arguments: string }> {
  return outputs.flatMap((output) => (output.kind === "call" ? [output.call.function] : []));
}

describe("ToolCallDetector", function () {
  const tagged = 'Sure.<tool_call>{"name":"get_weather","arguments":{"city":"Paris"}}</tool_call>';

  it("detects a tagged call split into single characters", function () {
    const outputs = drain(detector(), [...tagged]);
    expect(textOf(outputs)).to.equal("Sure.");
    expect(callsOf(outputs)).to.deep.equal([{ name: "get_weather", arguments: '{"city":"Paris"}' }]);
  });

  it("gives calls an id and the function type", function () {
    const outputs = drain(detector(), [tagged]);
    const call = outputs.find((output) => output.kind === "call");
    expect(call?.kind).to.equal("call");
    if (call?.kind === "call") {
      expect(call.call.id).to.match(/^call_[a-z0-9]+$/);
      expect(call.call.type).to.equal("function");
    }
  });

  it("releases a body that does not parse as text", function () {
    const subject = detector();
    expect(subject.push("<tool_call>not json</tool_call> ok")).to.deep.equal([
      { kind: "text", text: "<tool_call>not json</tool_call> ok" },
    ]);
    expect(subject.flush()).to.deep.equal([]);
  });

  it("parses an unterminated body at flush", function () {
    const outputs = drain(detector(), ['<tool_call>{"name":"get_weather","arguments":{}}']);
    expect(callsOf(outputs)).to.deep.equal([{ name: "get_weather", arguments: "{}" }]);
  });

  it("releases an oversized body as text", function () {
    const subject = detector("json", 10);
    const body = "x".repeat(20);
    expect(subject.push(`<tool_call>${body}`)).to.deep.equal([{ kind: "text", text: `<tool_call>${body}` }]);
  });

  it("drops text that follows a detected call", function () {
    const outputs = drain(detector(), [`${tagged} and some trailing words`]);
    expect(textOf(outputs)).to.equal("Sure.");
    expect(callsOf(outputs)).to.have.length(1);
  });

  it("passes plain text through unchanged", function () {
    const outputs = drain(detector(), ["no ", "tools ", "<here"]);
    expect(textOf(outputs)).to.equal("no tools <here");
    expect(callsOf(outputs)).to.deep.equal([]);
  });

  it("captures inline notations to the end of output", function () {
    const outputs = drain(detector("gemma"), ["Let me check.\n", "call:get_weather{city:", "<escape>Paris<escape>}"]);
    expect(textOf(outputs)).to.equal("Let me check.\n");
    expect(callsOf(outputs)).to.deep.equal([{ name: "get_weather", arguments: '{"city":"Paris"}' }]);
  });

  it("captures an inline notation at the very start of output", function () {
    const outputs = drain(detector("gemma"), ["ca", "ll:get_weather{city:<escape>Paris<escape>}"]);
    expect(textOf(outputs)).to.equal("");
    expect(callsOf(outputs)).to.deep.equal([{ name: "get_weather", arguments: '{"city":"Paris"}' }]);
  });

  it("treats a line-start marker in the middle of a line as prose", function () {
    const subject = detector("gemma");
    expect(subject.push("I will call: nothing")).to.deep.equal([{ kind: "text", text: "I will call: nothing" }]);
    expect(subject.flush()).to.deep.equal([]);
  });

  it("treats a mid-line functions. reference as prose", function () {
    const subject = detector("kimi_k2");
    expect(subject.push("See functions.get_weather in the docs")).to.deep.equal([
      { kind: "text", text: "See functions.get_weather in the docs" },
    ]);
  });

  it("holds a possible line-start marker only at the start of a line", function () {
    const subject = detector("gemma");
    expect(subject.push("Done.\nca")).to.deep.equal([{ kind: "text", text: "Done.\n" }]);
    expect(subject.push("t")).to.deep.equal([{ kind: "text", text: "cat" }]);
  });
});
