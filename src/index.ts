#!/usr/bin/env node
/**
 * market-scout CLI - Entry Point
 * Personalized market research through a fixed sequence of LLM tasks
 *
 * EXECUTION FLOW:
 * ===============
 * 1. Load environment variables from .env (dotenv/config)
 * 2. Parse CLI arguments (parseArgs)
 * 3. Validate configuration (getConfig)
 * 4. Branch based on command:
 *    - "run"       → runResearch() - seven tasks, one provider, saved report
 *    - "show"      → summary of a saved run (loadRun)
 *    - "providers" → which credentials are set and which provider wins
 *    - "profile"   → show the caller profile or write a sample
 * 5. Display results to console
 *
 * USAGE:
 *   npm run research -- "enterprise LLM platforms"
 *   npm run research -- "edge AI chips" --preset strict --no-profile
 *   npm run providers
 *   npm run show -- <runId>
 */

import "dotenv/config";
import path from "path";

import { logger } from "./core/logger.js";
import { getConfig, type Config } from "./core/config.js";
import { CredentialMissingError, isScoutError } from "./core/errors.js";
import { parseArgs, type CliArgs, type CliOptions } from "./cli/args.js";
import { getProviderInfo, PROVIDERS } from "./providers/registry.js";
import type { CustomLimits } from "./llm/types.js";
import type { ExecutiveReport } from "./schemas/tasks.js";
import {
  createSampleProfile,
  loadProfile,
  profileExists,
  saveProfile,
  summarizeProfile,
} from "./schemas/profile.js";
import { findExecutive } from "./pipeline/report.js";
import { runResearch } from "./pipeline/research-run.js";
import { getRunDir, loadRun, type StoredRun } from "./pipeline/run-store.js";

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
market-scout - Personalized market research with interchangeable LLM providers

USAGE:
  npm run research -- <topic> [options]
  npx tsx src/index.ts [command] [options]

COMMANDS:
  run <topic>          Run the research pipeline (default)
  show <runId>         Show a saved run
  providers            Show configured providers and the one that will be used
  profile [show|init]  Show the caller profile, or write a sample one
  help                 Show this help message

OPTIONS:
  -p, --profile <path>      Caller profile JSON (default: PROFILE_PATH)
      --no-profile          Run without company context
      --preset <name>       strict, standard or custom (default: LLM_PRESET)
      --max-tokens <n>      Output token ceiling (custom preset, max 1024)
      --temperature <t>     Sampling temperature 0-1 (custom preset)
      --timeout <seconds>   Request timeout (custom preset, max 120)
      --provider <id>       Pin a provider: ${PROVIDERS.map((p) => p.id).join(", ")}
  -f, --force               Overwrite an existing profile (profile init)
  -v, --verbose             Enable debug logging

CREDENTIALS (first one set wins, in this order):
${PROVIDERS.map((p) => `  ${p.credentialSlot.padEnd(20)}${p.name} (${p.defaultModel})`).join("\n")}

OUTPUT:
  Results are saved to ./data/runs/{runId}/
  - run.json    Structured task results
  - report.md   Human-readable report
`);
}

function customLimits(options: CliOptions): CustomLimits | undefined {
  const limits: CustomLimits = {};
  if (options.maxTokens !== undefined) limits.maxTokens = options.maxTokens;
  if (options.temperature !== undefined) limits.temperature = options.temperature;
  if (options.timeoutSeconds !== undefined) limits.timeoutMs = options.timeoutSeconds * 1000;
  return Object.keys(limits).length > 0 ? limits : undefined;
}

/**
 * Format and display results
 */
function displayResults(run: StoredRun, executive?: ExecutiveReport, reportPath?: string): void {
  console.log("\n" + "=".repeat(60));
  console.log("RESEARCH RESULTS");
  console.log("=".repeat(60));

  console.log(`\nRun ID:   ${run.runId}`);
  console.log(`Topic:    ${run.topic}`);
  console.log(`Provider: ${run.provider} (${run.model}, ${run.preset} preset)`);
  console.log(`Status:   ${run.status}`);
  console.log(`Duration: ${(run.durationMs / 1000).toFixed(1)}s`);

  console.log("\n--- Tasks ---");
  for (const result of run.results) {
    const context = result.injectedFields.length > 0 ? result.injectedFields.join(", ") : "none";
    console.log(`  ✓ ${result.title}`);
    console.log(
      `    Attempts: ${result.attempts}  Prompt: ${result.promptTokens} tokens  Context: ${context}`
    );
  }
  if (run.failure) {
    console.log(`  ✗ ${run.failure.taskId} (${run.failure.code})`);
    console.log(`    ${run.failure.message}`);
  }

  if (executive) {
    console.log("\n--- Executive Summary ---");
    console.log(executive.executiveSummary);
    console.log("\nRecommendations:");
    for (const recommendation of executive.recommendations) {
      console.log(`  - ${recommendation}`);
    }
  }

  if (reportPath) {
    console.log(`\nReport: ${reportPath}`);
  }
  console.log("\n" + "=".repeat(60));
}

function showProviders(): void {
  const info = getProviderInfo(process.env);

  console.log("\nLLM providers (in priority order):\n");
  for (const provider of PROVIDERS) {
    const status = info.available.includes(provider.id) ? "set" : "missing";
    const marker = info.selected === provider.id ? "→" : " ";
    console.log(
      `${marker} ${provider.name.padEnd(14)} ${provider.credentialSlot.padEnd(20)} ${status.padEnd(8)} ${provider.defaultModel} (cost efficiency: ${provider.costEfficiency})`
    );
  }

  if (info.selected) {
    console.log(`\nSelected: ${info.name} (${info.model})`);
  } else {
    console.log(`\nNo provider available. Set one of: ${info.missingSlots.join(", ")}`);
  }
}

async function profileCommand(args: CliArgs, config: Config): Promise<void> {
  const profilePath = args.options.profilePath ?? config.defaults.profilePath;

  if (args.profileAction === "init") {
    if ((await profileExists(profilePath)) && !args.options.force) {
      console.error(`Profile already exists at ${profilePath}. Use --force to overwrite.`);
      process.exit(1);
    }
    const saved = await saveProfile(createSampleProfile(), profilePath);
    console.log(`Sample profile written to ${profilePath}`);
    console.log(`  ${summarizeProfile(saved)}`);
    console.log("Edit it to describe your company before running research.");
    return;
  }

  const profile = await loadProfile(profilePath);
  if (!profile) {
    console.log(`No profile found at ${profilePath}. Create one with: profile init`);
    return;
  }
  console.log(`\nProfile: ${profilePath}\n`);
  console.log(JSON.stringify(profile, null, 2));
}

async function runCommand(args: CliArgs, config: Config): Promise<void> {
  const { options } = args;
  const profilePath = options.profilePath ?? config.defaults.profilePath;

  const profile = options.noProfile ? null : await loadProfile(profilePath);
  if (!options.noProfile && !profile) {
    logger.warn(`No caller profile at ${profilePath}; running without company context`);
  }

  const custom = customLimits(options);
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.error("\nCancelling: no further requests will be made...");
    controller.abort();
  });

  console.log(`\nmarket-scout - Researching: "${args.topic}"`);
  if (profile) {
    console.log(`  Profile: ${summarizeProfile(profile)}`);
  }
  console.log();

  const outcome = await runResearch({
    topic: args.topic,
    profile,
    signal: controller.signal,
    provider: options.provider,
    preset: options.preset ?? (custom ? "custom" : undefined),
    custom,
    config,
  });

  displayResults(outcome.run, outcome.report.executive, outcome.saved?.reportPath);

  if (outcome.run.status === "failed") {
    process.exit(1);
  }
}

async function showCommand(args: CliArgs, config: Config): Promise<void> {
  const runId = args.topic;
  const run = await loadRun(config.defaults.dataDir, runId);
  if (!run) {
    console.error(`No saved run '${runId}' in ${config.defaults.dataDir}`);
    process.exit(1);
  }

  const reportPath = path.join(getRunDir(config.defaults.dataDir, run.runId), "report.md");
  displayResults(run, findExecutive(run.results), reportPath);
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================
async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    printHelp();
    process.exit(1);
  }

  if (args.command === "help" || ((args.command === "run" || args.command === "show") && !args.topic)) {
    printHelp();
    process.exit(args.command === "help" ? 0 : 1);
  }

  let config: Config;
  try {
    config = getConfig();
  } catch (error) {
    console.error("Configuration error:", error instanceof Error ? error.message : error);
    process.exit(1);
  }

  logger.setLevel(args.options.verbose ? "debug" : config.defaults.logLevel);

  try {
    switch (args.command) {
      case "providers":
        showProviders();
        break;
      case "profile":
        await profileCommand(args, config);
        break;
      case "run":
        await runCommand(args, config);
        break;
      case "show":
        await showCommand(args, config);
        break;
    }
  } catch (error) {
    console.error("\nResearch failed:", error instanceof Error ? error.message : error);
    if (error instanceof CredentialMissingError) {
      console.error("\nAdd one of these to your .env file:");
      for (const slot of error.slots) {
        console.error(`  ${slot}`);
      }
    } else if (isScoutError(error) && args.options.verbose) {
      console.error(JSON.stringify(error.toJSON(), null, 2));
    }
    process.exit(1);
  }
}

// Run
main().catch(console.error);
