import { describe, expect, it } from "vitest";
import { ConfigError } from "../core/errors.js";
import { listPlaceholders, renderTemplate } from "./template.js";

describe("listPlaceholders", () => {
  it("lists each name once in order of appearance", () => {
    expect(listPlaceholders("{{topic}} vs {{ market-research }} and {{topic}}")).toEqual([
      "topic",
      "market-research",
    ]);
  });

  it("returns nothing for plain text", () => {
    expect(listPlaceholders("No placeholders {here}")).toEqual([]);
  });
});

describe("renderTemplate", () => {
  it("fills every occurrence", () => {
    expect(renderTemplate("{{topic}}: {{a}} / {{topic}}", { topic: "edge AI", a: '{"x":1}' })).toBe(
      'edge AI: {"x":1} / edge AI'
    );
  });

  it("fails on a placeholder without a value", () => {
    expect(() => renderTemplate("{{missing}}", { topic: "x" })).toThrow(ConfigError);
  });

  it("does not resolve inherited object keys", () => {
    expect(() => renderTemplate("{{constructor}}", {})).toThrow(
      "Template references unknown value 'constructor'"
    );
  });
});
