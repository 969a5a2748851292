/**
 * Run store
 * Persists each run under DATA_DIR/runs/<runId>/ as run.json plus a
 * markdown report.
 */

import { z } from "zod";
import fs from "fs/promises";
import path from "path";
import { PROVIDER_IDS } from "../providers/types.js";
import { formatReportMarkdown, type ResearchReport } from "./report.js";
import type { PipelineRun } from "./task-pipeline.js";

const TaskResultSchema = z.object({
  taskId: z.string(),
  index: z.number().int(),
  title: z.string(),
  payload: z.unknown(),
  attempts: z.number().int(),
  injectedFields: z.array(z.string()),
  droppedFields: z.array(z.string()),
  baseTokens: z.number(),
  contextTokens: z.number(),
  promptTokens: z.number(),
  durationMs: z.number(),
});

export const StoredRunSchema = z.object({
  runId: z.string(),
  topic: z.string(),
  provider: z.enum(PROVIDER_IDS),
  model: z.string(),
  preset: z.enum(["strict", "standard", "custom"]),
  status: z.enum(["success", "partial", "failed"]),
  results: z.array(TaskResultSchema),
  failure: z
    .object({
      taskId: z.string(),
      index: z.number().int(),
      code: z.string(),
      message: z.string(),
      attempts: z.number().int(),
    })
    .optional(),
  profileUsed: z.boolean(),
  startedAt: z.string(),
  completedAt: z.string(),
  durationMs: z.number(),
});

export type StoredRun = z.infer<typeof StoredRunSchema>;

export interface SavedRunPaths {
  dir: string;
  runPath: string;
  reportPath: string;
}

export function getRunDir(dataDir: string, runId: string): string {
  return path.join(dataDir, "runs", runId);
}

/**
 * Save a run and its report
 */
export async function saveRun(
  run: PipelineRun,
  report: ResearchReport,
  dataDir: string
): Promise<SavedRunPaths> {
  const dir = getRunDir(dataDir, run.runId);
  await fs.mkdir(dir, { recursive: true });

  const runPath = path.join(dir, "run.json");
  await fs.writeFile(runPath, JSON.stringify(run, null, 2));

  const reportPath = path.join(dir, "report.md");
  await fs.writeFile(reportPath, formatReportMarkdown(report));

  return { dir, runPath, reportPath };
}

/**
 * Load a saved run. Missing or unreadable runs give null.
 */
export async function loadRun(dataDir: string, runId: string): Promise<StoredRun | null> {
  const filePath = path.join(getRunDir(dataDir, runId), "run.json");
  try {
    const content = await fs.readFile(filePath, "utf-8");
    return StoredRunSchema.parse(JSON.parse(content));
  } catch {
    return null;
  }
}
