/**
 * Task Pipeline - Sequential Orchestrator
 * Runs the research tasks strictly in order, threading each payload into
 * the prompts of later tasks.
 *
 * STATE MACHINE:
 * ==============
 *   pending → running(0) → running(1) → ... → completed
 *                  │             │
 *                  └─────────────┴──→ failed      (terminal task failure)
 *                                └──→ cancelled   (signal aborted between tasks or retries)
 *
 * running(i):
 *   base prompt  = persona + task template (topic, earlier payloads) + output schema
 *   final prompt = injectContext(base prompt, profile, task fields, task share)
 *   payload      = generateValidated(final prompt, task schema, task retries)
 *
 * A failed task ends the run. Results already produced are kept and
 * returned with the failure; nothing is skipped or reordered.
 */

import { randomUUID } from "crypto";
import { getPersonaPreamble } from "../agents/personas.js";
import { logger, type ChildLogger } from "../core/logger.js";
import {
  ConfigError,
  TaskCancelledError,
  ValidationFailureError,
  wrapError,
  type ScoutError,
} from "../core/errors.js";
import { injectContext } from "../context/injector.js";
import { estimateTokens, type TokenCounter } from "../context/tokens.js";
import type { BoundLlm, LlmClient, LlmPreset } from "../llm/types.js";
import type { ProviderId } from "../providers/types.js";
import type { CallerProfile, ProfileField } from "../schemas/profile.js";
import { validateTaskSpecs, type TaskSpec } from "./tasks.js";
import { renderTemplate, TOPIC_PLACEHOLDER } from "./template.js";
import { formatOutputInstructions, generateValidated } from "./validator.js";

export type PipelineState =
  | { kind: "pending" }
  | { kind: "running"; index: number; taskId: string }
  | { kind: "completed" }
  | { kind: "failed"; index: number; taskId: string }
  | { kind: "cancelled"; nextIndex: number };

export type RunStatus = "success" | "partial" | "failed";

export interface TaskResult {
  taskId: string;
  index: number;
  title: string;
  payload: unknown;
  attempts: number;
  injectedFields: ProfileField[];
  droppedFields: ProfileField[];
  baseTokens: number;
  contextTokens: number;
  promptTokens: number;
  durationMs: number;
}

export interface TaskFailure {
  taskId: string;
  index: number;
  code: string;
  message: string;
  attempts: number;
}

export interface PipelineRun {
  runId: string;
  topic: string;
  provider: ProviderId;
  model: string;
  preset: LlmPreset;
  status: RunStatus;
  /** Successful tasks in execution order */
  results: TaskResult[];
  failure?: TaskFailure;
  profileUsed: boolean;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

export interface TaskPipelineDeps {
  llm: BoundLlm;
  tasks: readonly TaskSpec[];
  countTokens?: TokenCounter;
  onStateChange?: (state: PipelineState) => void;
}

export interface PipelineRunInput {
  topic: string;
  profile?: CallerProfile | null;
  /** Checked before each request; the request in flight is allowed to finish */
  signal?: AbortSignal;
}

/**
 * Prompt for one task before context injection
 */
export function buildBasePrompt(
  task: TaskSpec,
  topic: string,
  previous: readonly TaskResult[]
): string {
  const values: Record<string, string> = { [TOPIC_PLACEHOLDER]: topic };
  for (const result of previous) {
    values[result.taskId] = JSON.stringify(result.payload);
  }

  return [
    getPersonaPreamble(task.agent),
    `Task: ${renderTemplate(task.template, values)}`,
    formatOutputInstructions(task.outputSchema),
  ].join("\n\n");
}

/**
 * Wrap a client so every outbound request is counted
 */
function countingClient(client: LlmClient): { client: LlmClient; calls: () => number } {
  let calls = 0;
  return {
    client: {
      provider: client.provider,
      generate(prompt, config) {
        calls++;
        return client.generate(prompt, config);
      },
    },
    calls: () => calls,
  };
}

// ============================================================
// TASK PIPELINE CLASS
// ============================================================
export class TaskPipeline {
  private log = logger.child({ component: "pipeline" });
  private state: PipelineState = { kind: "pending" };
  private readonly countTokens: TokenCounter;

  constructor(private readonly deps: TaskPipelineDeps) {
    validateTaskSpecs(deps.tasks);
    this.countTokens = deps.countTokens ?? estimateTokens;
  }

  getState(): PipelineState {
    return this.state;
  }

  /**
   * Run every task in order. Task failures are reported in the returned
   * run, never thrown.
   */
  async run(input: PipelineRunInput): Promise<PipelineRun> {
    const topic = input.topic.trim();
    if (!topic) {
      throw new ConfigError("Research topic is required");
    }
    if (this.state.kind === "running") {
      throw new ConfigError("Pipeline is already running");
    }

    const { llm, tasks } = this.deps;
    const profile = input.profile ?? null;
    const runId = randomUUID();
    const startTime = Date.now();
    const log = this.log.child({ runId, provider: llm.config.provider });

    this.transition({ kind: "pending" }, log);
    log.info("Pipeline started", {
      topic,
      tasks: tasks.length,
      model: llm.config.model,
      preset: llm.config.preset,
      profile: profile ? profile.companyName : null,
    });

    const results: TaskResult[] = [];
    let failure: TaskFailure | undefined;
    let outcome: "completed" | "failed" | "cancelled" = "completed";

    for (const [index, task] of tasks.entries()) {
      if (input.signal?.aborted) {
        outcome = "cancelled";
        this.transition({ kind: "cancelled", nextIndex: index }, log);
        break;
      }

      this.transition({ kind: "running", index, taskId: task.id }, log);
      const taskLog = log.child({ taskId: task.id });
      const counted = countingClient(llm.client);
      const taskStart = Date.now();

      try {
        const basePrompt = buildBasePrompt(task, topic, results);
        const injected = injectContext({
          basePrompt,
          profile,
          fields: task.contextFields,
          contextShare: task.contextShare,
          countTokens: this.countTokens,
        });

        if (injected.block.dropped.length > 0) {
          taskLog.debug("Context fields dropped to fit budget", {
            dropped: injected.block.dropped,
            contextShare: task.contextShare,
          });
        }

        const output = await generateValidated({
          llm: { ...llm, client: counted.client },
          prompt: injected.prompt,
          schema: task.outputSchema,
          maxRetries: task.maxRetries,
          taskId: task.id,
          log: taskLog,
          signal: input.signal,
        });

        const result: TaskResult = {
          taskId: task.id,
          index,
          title: task.title,
          payload: output.data,
          attempts: output.attempts,
          injectedFields: injected.block.fields,
          droppedFields: injected.block.dropped,
          baseTokens: injected.baseTokens,
          contextTokens: injected.block.tokens,
          promptTokens: injected.promptTokens,
          durationMs: Date.now() - taskStart,
        };
        results.push(result);

        taskLog.metric("prompt_tokens", result.promptTokens, { contextTokens: result.contextTokens });
        taskLog.metric("task_attempts", result.attempts);
        taskLog.info(`Task completed: ${task.title}`, { durationMs: result.durationMs });
      } catch (error) {
        if (error instanceof TaskCancelledError) {
          taskLog.info(`Task cancelled: ${task.title}`, { attempts: error.attempts });
          outcome = "cancelled";
          this.transition({ kind: "cancelled", nextIndex: index }, log);
          break;
        }

        const scoutError: ScoutError = wrapError(error, `Task '${task.id}' failed`);
        failure = {
          taskId: task.id,
          index,
          code: scoutError.code,
          message: scoutError.message,
          attempts: scoutError instanceof ValidationFailureError ? scoutError.attempts : counted.calls(),
        };
        taskLog.error(`Task failed: ${task.title}`, scoutError);
        outcome = "failed";
        this.transition({ kind: "failed", index, taskId: task.id }, log);
        break;
      }
    }

    if (outcome === "completed") {
      this.transition({ kind: "completed" }, log);
    }

    const status: RunStatus =
      outcome === "completed" ? "success" : outcome === "cancelled" ? "partial" : "failed";
    const completedAt = Date.now();

    const run: PipelineRun = {
      runId,
      topic,
      provider: llm.config.provider,
      model: llm.config.model,
      preset: llm.config.preset,
      status,
      results,
      failure,
      profileUsed: profile !== null,
      startedAt: new Date(startTime).toISOString(),
      completedAt: new Date(completedAt).toISOString(),
      durationMs: completedAt - startTime,
    };

    log.info(`Pipeline ${status}`, {
      completed: results.length,
      total: tasks.length,
      durationMs: run.durationMs,
    });

    return run;
  }

  private transition(next: PipelineState, log: ChildLogger): void {
    this.state = next;
    log.debug(`State: ${describeState(next)}`);
    this.deps.onStateChange?.(next);
  }
}

function describeState(state: PipelineState): string {
  switch (state.kind) {
    case "running":
      return `running(${state.index}) ${state.taskId}`;
    case "failed":
      return `failed at ${state.index} ${state.taskId}`;
    case "cancelled":
      return `cancelled before ${state.nextIndex}`;
    default:
      return state.kind;
  }
}
