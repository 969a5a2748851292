/**
 * Research run - end-to-end entry point
 *
 * CALL FLOW:
 * ==========
 * runResearch(options)
 *   ├─ getConfig()                  → preset, limits, retries, data dir
 *   ├─ resolveProvider(env)         → CredentialMissingError before any request
 *   ├─ createBoundLlm()             → one client for the whole run
 *   ├─ TaskPipeline.run()           → PipelineRun (success | partial | failed)
 *   ├─ aggregateRun()               → ResearchReport
 *   └─ saveRun()                    → DATA_DIR/runs/<runId>/{run.json,report.md}
 */

import { getConfig, type Config, type TokenCounterKind } from "../core/config.js";
import { logger } from "../core/logger.js";
import { createTiktokenCounter, estimateTokens, type TokenCounter } from "../context/tokens.js";
import { createBoundLlm } from "../llm/index.js";
import type { BoundLlm, CustomLimits, LlmPreset } from "../llm/types.js";
import { resolveProvider } from "../providers/registry.js";
import type { ProviderId, ResolvedProvider } from "../providers/types.js";
import type { CallerProfile } from "../schemas/profile.js";
import { aggregateRun, type ResearchReport } from "./report.js";
import { saveRun, type SavedRunPaths } from "./run-store.js";
import { TaskPipeline, type PipelineRun, type PipelineState } from "./task-pipeline.js";
import { createDefaultTasks, type TaskSpec } from "./tasks.js";

export interface ResearchRunOptions {
  topic: string;
  profile?: CallerProfile | null;
  signal?: AbortSignal;

  /** Overrides for the configured LLM settings */
  provider?: ProviderId;
  preset?: LlmPreset;
  custom?: CustomLimits;

  /** Defaults to the seven-step research sequence */
  tasks?: TaskSpec[];
  /** Write run.json and report.md (default: true) */
  persist?: boolean;
  onStateChange?: (state: PipelineState) => void;

  config?: Config;
  /** Where credentials are read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  createLlm?: (resolved: ResolvedProvider, preset: LlmPreset, custom: CustomLimits) => BoundLlm;
}

export interface ResearchRunOutcome {
  run: PipelineRun;
  report: ResearchReport;
  saved?: SavedRunPaths;
}

export function createTokenCounter(kind: TokenCounterKind): TokenCounter {
  return kind === "tiktoken" ? createTiktokenCounter() : estimateTokens;
}

function mergeLimits(base: CustomLimits, overrides: CustomLimits = {}): CustomLimits {
  return {
    maxTokens: overrides.maxTokens ?? base.maxTokens,
    temperature: overrides.temperature ?? base.temperature,
    timeoutMs: overrides.timeoutMs ?? base.timeoutMs,
  };
}

/**
 * Run the full research sequence for a topic
 */
export async function runResearch(options: ResearchRunOptions): Promise<ResearchRunOutcome> {
  const config = options.config ?? getConfig();
  const log = logger.child({ component: "research" });

  const resolved = resolveProvider(options.env ?? process.env, options.provider ?? config.llm.provider);
  log.info(`Using provider: ${resolved.descriptor.name}`, {
    provider: resolved.descriptor.id,
    model: resolved.descriptor.defaultModel,
  });

  const preset = options.preset ?? config.llm.preset;
  const custom = mergeLimits(config.llm.custom, options.custom);
  const llm = (options.createLlm ?? createBoundLlm)(resolved, preset, custom);

  const pipeline = new TaskPipeline({
    llm,
    tasks: options.tasks ?? createDefaultTasks(config.pipeline.maxRetries),
    countTokens: createTokenCounter(config.llm.tokenCounter),
    onStateChange: options.onStateChange,
  });

  const run = await pipeline.run({
    topic: options.topic,
    profile: options.profile,
    signal: options.signal,
  });
  const report = aggregateRun(run);

  if (options.persist === false) {
    return { run, report };
  }

  const saved = await saveRun(run, report, config.defaults.dataDir);
  log.info(`Run saved to ${saved.dir}`, { runId: run.runId });
  return { run, report, saved };
}
