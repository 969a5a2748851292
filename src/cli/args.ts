/**
 * Command line arguments
 */

import { ConfigError } from "../core/errors.js";
import type { LlmPreset } from "../llm/types.js";
import { PROVIDER_IDS, type ProviderId } from "../providers/types.js";

export type Command = "run" | "show" | "providers" | "profile" | "help";
export type ProfileAction = "show" | "init";

export interface CliOptions {
  profilePath?: string;
  noProfile: boolean;
  preset?: LlmPreset;
  maxTokens?: number;
  temperature?: number;
  timeoutSeconds?: number;
  provider?: ProviderId;
  force: boolean;
  verbose: boolean;
}

export interface CliArgs {
  command: Command;
  /** Research topic, or the run id for show */
  topic: string;
  profileAction: ProfileAction;
  options: CliOptions;
}

const COMMANDS: readonly Command[] = ["run", "show", "providers", "profile", "help"];
const PRESET_NAMES: readonly LlmPreset[] = ["strict", "standard", "custom"];

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function isPreset(value: string): value is LlmPreset {
  return PRESET_NAMES.some((p) => p === value);
}

function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("-")) {
    throw new ConfigError(`${flag} expects a value`);
  }
  return value;
}

function parseNumber(flag: string, value: string | undefined): number {
  const raw = requireValue(flag, value);
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${flag} expects a number, got '${raw}'`);
  }
  return parsed;
}

/**
 * Parse arguments (without the node and script entries).
 * The first bare word may name a command; remaining bare words form the topic.
 */
export function parseArgs(args: readonly string[]): CliArgs {
  const result: CliArgs = {
    command: "run",
    topic: "",
    profileAction: "show",
    options: {
      noProfile: false,
      force: false,
      verbose: false,
    },
  };

  const words: string[] = [];
  let commandSeen = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--profile" || arg === "-p") {
      result.options.profilePath = requireValue(arg, args[++i]);
    } else if (arg === "--no-profile") {
      result.options.noProfile = true;
    } else if (arg === "--preset") {
      const preset = requireValue(arg, args[++i]);
      if (!isPreset(preset)) {
        throw new ConfigError(`Unknown preset '${preset}'. Use one of: ${PRESET_NAMES.join(", ")}`);
      }
      result.options.preset = preset;
    } else if (arg === "--max-tokens") {
      result.options.maxTokens = parseNumber(arg, args[++i]);
    } else if (arg === "--temperature") {
      result.options.temperature = parseNumber(arg, args[++i]);
    } else if (arg === "--timeout") {
      result.options.timeoutSeconds = parseNumber(arg, args[++i]);
    } else if (arg === "--provider") {
      const provider = requireValue(arg, args[++i]);
      if (!isProviderId(provider)) {
        throw new ConfigError(
          `Unknown provider '${provider}'. Use one of: ${PROVIDER_IDS.join(", ")}`
        );
      }
      result.options.provider = provider;
    } else if (arg === "--force" || arg === "-f") {
      result.options.force = true;
    } else if (arg === "--verbose" || arg === "-v") {
      result.options.verbose = true;
    } else if (arg === "--help" || arg === "-h") {
      result.command = "help";
      commandSeen = true;
    } else if (arg.startsWith("-")) {
      throw new ConfigError(`Unknown option '${arg}'`);
    } else if (!commandSeen && words.length === 0 && isCommand(arg)) {
      result.command = arg;
      commandSeen = true;
    } else if (result.command === "profile" && words.length === 0 && (arg === "show" || arg === "init")) {
      result.profileAction = arg;
    } else {
      words.push(arg);
    }
  }

  result.topic = words.join(" ").trim();
  return result;
}
