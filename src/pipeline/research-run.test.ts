import fs from "fs/promises";
import os from "os";
import path from "path";
import { z } from "zod";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../core/config.js";
import { CredentialMissingError } from "../core/errors.js";
import { buildLlmConfig } from "../llm/presets.js";
import type { BoundLlm, CustomLimits, LlmPreset } from "../llm/types.js";
import type { ResolvedProvider } from "../providers/types.js";
import { createSampleProfile, type ProfileField } from "../schemas/profile.js";
import { ScriptedLlmClient, sampleReply } from "../testing/scripted-llm.js";
import { runResearch } from "./research-run.js";
import { createDefaultTasks, type TaskSpec } from "./tasks.js";

let dataDir: string;

beforeEach(async () => {
  dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "research-"));
});

afterEach(async () => {
  await fs.rm(dataDir, { recursive: true, force: true });
});

function scriptedFactory(replies: string[]) {
  const clients: ScriptedLlmClient[] = [];
  const createLlm = vi.fn((resolved: ResolvedProvider, preset: LlmPreset, custom: CustomLimits): BoundLlm => {
    const client = new ScriptedLlmClient(replies, resolved.descriptor.id);
    clients.push(client);
    return { provider: resolved, config: buildLlmConfig(resolved, preset, custom), client };
  });
  return { createLlm, clients };
}

describe("runResearch", () => {
  it("fails before creating a client when no credential is set", async () => {
    const { createLlm } = scriptedFactory([]);

    await expect(
      runResearch({ topic: "automation", env: {}, config: loadConfig({ DATA_DIR: dataDir }), createLlm })
    ).rejects.toBeInstanceOf(CredentialMissingError);
    expect(createLlm).not.toHaveBeenCalled();
  });

  it("uses the best-ranked provider with a credential and runs four tasks in order", async () => {
    const fields: ProfileField[][] = [["companyName"], ["industry"], ["competitors"], ["challenges"]];
    const tasks = ["a", "b", "c", "d"].map((id, index): TaskSpec => ({
      id,
      title: id.toUpperCase(),
      agent: "seer",
      template: index === 0 ? "Scan {{topic}}." : `Continue from {{${["a", "b", "c"][index - 1]}}}.`,
      outputSchema: z.object({ step: z.string() }),
      contextFields: fields[index],
      contextShare: 80,
      maxRetries: 0,
    }));
    const { createLlm, clients } = scriptedFactory(["a", "b", "c", "d"].map((s) => JSON.stringify({ step: s })));

    const outcome = await runResearch({
      topic: "automation",
      profile: createSampleProfile(),
      tasks,
      env: { OPENAI_API_KEY: "test-secret", MISTRAL_API_KEY: "" },
      config: loadConfig({ DATA_DIR: dataDir }),
      createLlm,
    });

    expect(createLlm).toHaveBeenCalledTimes(1);
    expect(outcome.run.provider).toBe("openai");
    expect(outcome.run.model).toBe("gpt-4o-mini");
    expect(outcome.run.results.map((r) => r.taskId)).toEqual(["a", "b", "c", "d"]);
    expect(outcome.run.results.map((r) => r.injectedFields)).toEqual([
      ["companyName"],
      ["industry"],
      ["competitors"],
      ["challenges"],
    ]);
    expect(clients[0].prompts[1]).toContain('Continue from {"step":"a"}.');
  });

  it("applies config and overrides to the bound client", async () => {
    const tasks = createDefaultTasks(0);
    const { createLlm, clients } = scriptedFactory(tasks.map((t) => sampleReply(t.id)));

    await runResearch({
      topic: "automation",
      tasks,
      env: { GEN_MODEL_API: "test-secret", ANTHROPIC_API_KEY: "test-secret" },
      config: loadConfig({ DATA_DIR: dataDir, LLM_PRESET: "custom", LLM_MAX_TOKENS: "400" }),
      provider: "anthropic",
      custom: { temperature: 0.9 },
      persist: false,
      createLlm,
    });

    expect(clients[0].configs[0]).toMatchObject({
      provider: "anthropic",
      preset: "custom",
      maxTokens: 400,
      temperature: 0.9,
      timeoutMs: 60_000,
    });
  });

  it("binds limits from the environment without an explicit preset", async () => {
    const tasks = createDefaultTasks(0);
    const { createLlm, clients } = scriptedFactory(tasks.map((t) => sampleReply(t.id)));

    const outcome = await runResearch({
      topic: "automation",
      tasks,
      env: { OPENAI_API_KEY: "test-secret" },
      config: loadConfig({ DATA_DIR: dataDir, LLM_MAX_TOKENS: "800", LLM_TEMPERATURE: "0.9" }),
      persist: false,
      createLlm,
    });

    expect(outcome.run.preset).toBe("custom");
    expect(clients[0].configs[0]).toMatchObject({
      preset: "custom",
      maxTokens: 800,
      temperature: 0.9,
      timeoutMs: 60_000,
    });
  });

  it("saves the run and its report", async () => {
    const tasks = createDefaultTasks();
    const { createLlm } = scriptedFactory(tasks.map((t) => sampleReply(t.id)));

    const outcome = await runResearch({
      topic: "workflow automation",
      profile: createSampleProfile(),
      env: { MISTRAL_API_KEY: "test-secret" },
      config: loadConfig({ DATA_DIR: dataDir }),
      createLlm,
    });

    expect(outcome.run.status).toBe("success");
    expect(outcome.report.executive?.executiveSummary).toBe("Demand is strong in regulated segments.");
    expect(outcome.saved?.dir).toBe(path.join(dataDir, "runs", outcome.run.runId));

    const report = await fs.readFile(path.join(dataDir, "runs", outcome.run.runId, "report.md"), "utf-8");
    expect(report).toContain("## Executive Summary\n\nDemand is strong in regulated segments.");
  });

  it("returns a failed run instead of throwing when a task cannot be validated", async () => {
    const tasks = createDefaultTasks(1);
    const { createLlm, clients } = scriptedFactory([sampleReply("market-segments"), "nope", "still nope"]);

    const outcome = await runResearch({
      topic: "automation",
      tasks,
      env: { OPENAI_API_KEY: "test-secret" },
      config: loadConfig({ DATA_DIR: dataDir }),
      persist: false,
      createLlm,
    });

    expect(outcome.run.status).toBe("failed");
    expect(outcome.run.results).toHaveLength(1);
    expect(outcome.run.failure?.taskId).toBe("market-research");
    expect(clients[0].calls).toBe(3);
    expect(outcome.saved).toBeUndefined();
  });
});
