import { describe, expect, it } from "vitest";
import { createTiktokenCounter, estimateTokens } from "./tokens.js";

describe("estimateTokens", () => {
  it("rounds four characters per token up", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abc")).toBe(1);
    expect(estimateTokens("abcd")).toBe(1);
    expect(estimateTokens("abcde")).toBe(2);
  });
});

describe("createTiktokenCounter", () => {
  it("counts BPE tokens", () => {
    const count = createTiktokenCounter();
    expect(count("hello world")).toBe(2);
    expect(count("")).toBe(0);
  });
});
