import { describe, it, expect } from "vitest";
import { InterpretationError, LLMError, UsageError } from "../../src/core/errors";
import { CostLedger } from "../../src/llm/cost-tracker";
import {
  LlmInstructionInterpreter,
  classifyInstruction,
  type InterpreterDefaults,
} from "../../src/orchestration/instruction-interpreter";
import { FakeLLM } from "./helpers/fakes";

const defaults: InterpreterDefaults = { results: 10, platforms: "duckduckgo", depth: 0, timeoutSeconds: 900 };

describe("classifyInstruction", () => {
  it("should treat short noun phrases as terms", () => {
    expect(classifyInstruction("ocean diversity")).toBe("term");
    expect(classifyInstruction("Searchlight pictures")).toBe("term");
    expect(classifyInstruction("one two three four five six")).toBe("term");
  });

  it("should treat long text as an instruction", () => {
    expect(classifyInstruction("one two three four five six seven")).toBe("instruction");
    expect(classifyInstruction("x".repeat(61))).toBe("instruction");
  });

  it("should treat commands, questions and requests as instructions", () => {
    expect(classifyInstruction("find ocean news")).toBe("instruction");
    expect(classifyInstruction("What is new in AI")).toBe("instruction");
    expect(classifyInstruction("please ocean news")).toBe("instruction");
    expect(classifyInstruction("AI regulation?")).toBe("instruction");
  });
});

describe("LlmInstructionInterpreter", () => {
  it("should use a bare term directly with defaults and no inference call", async () => {
    const llm = new FakeLLM("{}");
    const ledger = new CostLedger(0.001);
    const request = await new LlmInstructionInterpreter(llm, defaults).interpret("ocean diversity", {}, { ledger });

    expect(request).toEqual({
      rawInstruction: "ocean diversity",
      searchTerm: "ocean diversity",
      targetResults: 10,
      platformSpec: "duckduckgo",
      depth: 0,
      timeoutSeconds: 900,
      source: "term",
    });
    expect(Object.isFrozen(request)).toBe(true);
    expect(llm.calls).toHaveLength(0);
    expect(ledger.callCount).toBe(0);
  });

  it("should apply explicit flags", async () => {
    const request = await new LlmInstructionInterpreter(null, defaults).interpret(
      "ocean diversity",
      { results: 5, platforms: "news", depth: 2, timeout: 60 },
      { ledger: new CostLedger(0) }
    );

    expect(request).toMatchObject({ targetResults: 5, platformSpec: "news", depth: 2, timeoutSeconds: 60 });
  });

  it("should infer a plan for instructions and let flags win", async () => {
    const llm = new FakeLLM(
      '```json\n{"search_term":"ocean biodiversity","suggested_platforms":["news","blogs"],"suggested_depth":"2","suggested_results":20}\n```'
    );
    const ledger = new CostLedger(0.001);
    const interpreter = new LlmInstructionInterpreter(llm, defaults, "interp-model");

    const request = await interpreter.interpret(
      "find me the latest coverage of ocean biodiversity loss",
      { results: 5 },
      { ledger }
    );

    expect(request).toMatchObject({
      searchTerm: "ocean biodiversity",
      platformSpec: "news, blogs",
      depth: 2,
      targetResults: 5,
      source: "inference",
    });
    expect(llm.calls[0]?.options?.model).toBe("interp-model");
    expect(llm.calls[0]?.options?.systemPrompt).toContain("reddit");
    expect(ledger.promptTokens).toBe(30);
    expect(ledger.completionTokens).toBe(12);
  });

  it("should fall back to defaults for null suggestions", async () => {
    const llm = new FakeLLM('{"search_term":"ai chips","suggested_depth":null,"suggested_results":null}');
    const request = await new LlmInstructionInterpreter(llm, defaults).interpret(
      "what is going on with ai chips",
      {},
      { ledger: new CostLedger(0) }
    );

    expect(request).toMatchObject({ searchTerm: "ai chips", depth: 0, targetResults: 10, platformSpec: "duckduckgo" });
  });

  it.each([
    ['{"search_term":"ocean diversity","suggested_platforms":"","suggested_depth":1}', 1],
    ['{"search_term":"ocean diversity","suggested_platforms":[],"suggested_depth":1}', 1],
    ['{"search_term":"ocean diversity","suggested_platforms":["  "]}', 0],
  ])("should treat an empty platform suggestion as no preference: %s", async (reply, depth) => {
    const request = await new LlmInstructionInterpreter(new FakeLLM(reply), defaults).interpret(
      "find me coverage of ocean diversity",
      {},
      { ledger: new CostLedger(0) }
    );

    expect(request).toMatchObject({ searchTerm: "ocean diversity", platformSpec: "duckduckgo", depth });
  });

  it("should raise InterpretationError when the inference call fails", async () => {
    const interpreter = new LlmInstructionInterpreter(new FakeLLM(new LLMError("Request timed out", "timeout")), defaults);
    await expect(
      interpreter.interpret("find ocean news", {}, { ledger: new CostLedger(0) })
    ).rejects.toMatchObject({ name: "InterpretationError", code: "timeout" });
  });

  it("should raise InterpretationError when no usable term comes back", async () => {
    const garbage = new LlmInstructionInterpreter(new FakeLLM("no idea"), defaults);
    await expect(garbage.interpret("find ocean news", {}, { ledger: new CostLedger(0) })).rejects.toBeInstanceOf(
      InterpretationError
    );

    const missing = new LlmInstructionInterpreter(new FakeLLM('{"suggested_depth":1}'), defaults);
    await expect(missing.interpret("find ocean news", {}, { ledger: new CostLedger(0) })).rejects.toBeInstanceOf(
      InterpretationError
    );
  });

  it("should require a client for instructions", async () => {
    await expect(
      new LlmInstructionInterpreter(null, defaults).interpret("find ocean news", {}, { ledger: new CostLedger(0) })
    ).rejects.toBeInstanceOf(InterpretationError);
  });

  it("should reject invalid flags with a usage error", async () => {
    const interpreter = new LlmInstructionInterpreter(null, defaults);
    const ctx = { ledger: new CostLedger(0) };

    await expect(interpreter.interpret("ocean", { depth: 5 }, ctx)).rejects.toBeInstanceOf(UsageError);
    await expect(interpreter.interpret("ocean", { results: 0 }, ctx)).rejects.toBeInstanceOf(UsageError);
    await expect(interpreter.interpret("ocean", { results: 2.5 }, ctx)).rejects.toBeInstanceOf(UsageError);
    await expect(interpreter.interpret("ocean", { timeout: 0 }, ctx)).rejects.toBeInstanceOf(UsageError);
  });
});
