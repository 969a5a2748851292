import { describe, expect, it } from "vitest";
import { ConfigError } from "../core/errors.js";
import { parseArgs } from "./args.js";

describe("parseArgs", () => {
  it("defaults to run and joins bare words into the topic", () => {
    const args = parseArgs(["enterprise", "LLM", "platforms"]);
    expect(args.command).toBe("run");
    expect(args.topic).toBe("enterprise LLM platforms");
    expect(args.options).toEqual({ noProfile: false, force: false, verbose: false });
  });

  it("reads run options", () => {
    const args = parseArgs([
      "run",
      "edge AI",
      "--preset",
      "custom",
      "--max-tokens",
      "512",
      "--temperature",
      "0.4",
      "--timeout",
      "90",
      "--provider",
      "mistral",
      "--profile",
      "profiles/acme.json",
      "-v",
    ]);

    expect(args.command).toBe("run");
    expect(args.topic).toBe("edge AI");
    expect(args.options).toEqual({
      noProfile: false,
      force: false,
      verbose: true,
      preset: "custom",
      maxTokens: 512,
      temperature: 0.4,
      timeoutSeconds: 90,
      provider: "mistral",
      profilePath: "profiles/acme.json",
    });
  });

  it("only lets the first bare word name a command", () => {
    expect(parseArgs(["help", "desk", "software"]).command).toBe("help");
    expect(parseArgs(["run", "help", "desk"]).topic).toBe("help desk");
  });

  it("parses profile subcommands", () => {
    expect(parseArgs(["profile"]).profileAction).toBe("show");
    const init = parseArgs(["profile", "init", "--force"]);
    expect(init.command).toBe("profile");
    expect(init.profileAction).toBe("init");
    expect(init.options.force).toBe(true);
  });

  it("reads the run id for show", () => {
    const args = parseArgs(["show", "3f2c9a"]);
    expect(args.command).toBe("show");
    expect(args.topic).toBe("3f2c9a");
  });

  it("recognises providers and help", () => {
    expect(parseArgs(["providers"]).command).toBe("providers");
    expect(parseArgs(["--help"]).command).toBe("help");
    expect(parseArgs(["run", "x", "--no-profile"]).options.noProfile).toBe(true);
  });

  it("rejects unknown values and options", () => {
    expect(() => parseArgs(["x", "--preset", "loose"])).toThrow(
      "Unknown preset 'loose'. Use one of: strict, standard, custom"
    );
    expect(() => parseArgs(["x", "--provider", "cohere"])).toThrow(
      "Unknown provider 'cohere'. Use one of: gemini, openai, anthropic, mistral"
    );
    expect(() => parseArgs(["x", "--max-tokens", "many"])).toThrow("--max-tokens expects a number, got 'many'");
    expect(() => parseArgs(["x", "--profile"])).toThrow("--profile expects a value");
    expect(() => parseArgs(["x", "--quick"])).toThrow(ConfigError);
  });
});
