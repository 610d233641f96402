import { describe, it, expect } from "vitest";
import { ModelCatalog, ModelFamily, defaultCatalog } from "../context/models";
import { charEstimate, estimatorFor, totalTokens } from "../context/tokens";
import { message } from "./helpers/fixtures";

describe("ModelCatalog", () => {
  it("resolves families from the bundled catalog", () => {
    expect(defaultCatalog.familyOf("openai/gpt-4o")).toBe(ModelFamily.Gpt);
    expect(defaultCatalog.familyOf("anthropic/claude-sonnet-4-20250514")).toBe(ModelFamily.Claude);
    expect(defaultCatalog.familyOf("gemini/gemini-2.5-pro")).toBe(ModelFamily.Gemini);
    expect(defaultCatalog.familyOf("some-local-model")).toBe(ModelFamily.Default);
  });

  it("uses family budgets and output caps", () => {
    expect(defaultCatalog.profileOf("anthropic/claude-sonnet-4-20250514")).toMatchObject({
      contextBudget: 108000,
      maxOutputTokens: 8192
    });
    expect(defaultCatalog.profileOf("openai/gpt-4o").contextBudget).toBe(100000);
    expect(defaultCatalog.profileOf("gemini/gemini-2.5-flash").maxOutputTokens).toBe(64000);
    expect(defaultCatalog.profileOf("deepseek/deepseek-chat").maxOutputTokens).toBeUndefined();
    expect(defaultCatalog.profileOf("some-local-model").contextBudget).toBe(31000);
  });

  it("routes overloaded models through the fallback prefix once", () => {
    const routed = defaultCatalog.fallbackFor("openai/gpt-4o");
    expect(routed).toBe("openrouter/openai/gpt-4o");
    expect(defaultCatalog.fallbackFor(routed)).toBe(routed);
    expect(defaultCatalog.familyOf(routed)).toBe(ModelFamily.Gpt);
  });

  it("rejects catalog files naming an unknown family", () => {
    expect(() => ModelCatalog.fromJson({ models: { "x-model": "llama" } })).toThrow();
  });
});

describe("token estimation", () => {
  it("estimates by characters", () => {
    expect(charEstimate("")).toBe(0);
    expect(charEstimate("abcde")).toBe(2);
    expect(estimatorFor("chars")).toBe(charEstimate);
  });

  it("counts with a tiktoken encoding", () => {
    expect(estimatorFor("cl100k_base")("hello world")).toBe(2);
  });

  it("serializes block content before counting", () => {
    const blocks = message("u1", "user", [{ type: "text", text: "hi" }]);
    // [{"type":"text","text":"hi"}] is 29 chars
    expect(totalTokens([blocks, message("u2", "user", "abcd")], charEstimate)).toBe(9);
  });
});
