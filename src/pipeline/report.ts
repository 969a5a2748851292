/**
 * Run report
 * Aggregates a pipeline run into one result and renders it as markdown
 */

import { ExecutiveReportSchema, type ExecutiveReport } from "../schemas/tasks.js";
import type { PipelineRun, RunStatus, TaskFailure } from "./task-pipeline.js";

export const EXECUTIVE_TASK_ID = "executive-report";

export interface ReportSection {
  taskId: string;
  title: string;
  payload: unknown;
}

export interface ResearchReport {
  runId: string;
  topic: string;
  status: RunStatus;
  provider: string;
  model: string;
  generatedAt: string;
  sections: ReportSection[];
  /** Present when the executive step completed */
  executive?: ExecutiveReport;
  failure?: TaskFailure;
  totals: {
    tasks: number;
    attempts: number;
    promptTokens: number;
    contextTokens: number;
  };
}

/**
 * Executive report from a run's results, when that step completed
 */
export function findExecutive(
  results: readonly { taskId: string; payload?: unknown }[]
): ExecutiveReport | undefined {
  const executiveResult = results.find((r) => r.taskId === EXECUTIVE_TASK_ID);
  const parsed = executiveResult ? ExecutiveReportSchema.safeParse(executiveResult.payload) : undefined;
  return parsed && parsed.success ? parsed.data : undefined;
}

export function aggregateRun(run: PipelineRun): ResearchReport {
  const sections = run.results.map((r) => ({ taskId: r.taskId, title: r.title, payload: r.payload }));

  return {
    runId: run.runId,
    topic: run.topic,
    status: run.status,
    provider: run.provider,
    model: run.model,
    generatedAt: run.completedAt,
    sections,
    executive: findExecutive(run.results),
    failure: run.failure,
    totals: {
      tasks: run.results.length,
      attempts: run.results.reduce((sum, r) => sum + r.attempts, 0),
      promptTokens: run.results.reduce((sum, r) => sum + r.promptTokens, 0),
      contextTokens: run.results.reduce((sum, r) => sum + r.contextTokens, 0),
    },
  };
}

/**
 * Format a report as human-readable markdown
 */
export function formatReportMarkdown(report: ResearchReport): string {
  const lines: string[] = [];

  lines.push(`# Market research: ${report.topic}`);
  lines.push("");
  lines.push(`**Run:** ${report.runId}`);
  lines.push(`**Status:** ${report.status}`);
  lines.push(`**Provider:** ${report.provider} (${report.model})`);
  lines.push(`**Generated:** ${report.generatedAt}`);
  lines.push("");

  if (report.executive) {
    const exec = report.executive;
    lines.push("## Executive Summary");
    lines.push("");
    lines.push(exec.executiveSummary);
    lines.push("");
    lines.push("## Competitor Landscape");
    lines.push("");
    lines.push(exec.competitorLandscape);
    lines.push("");
    lines.push("## Emerging Technology");
    lines.push("");
    lines.push(exec.emergingTechnology);
    lines.push("");
    lines.push("## Regulatory Outlook");
    lines.push("");
    lines.push(exec.regulatoryOutlook);
    lines.push("");
    lines.push("## Recommendations");
    lines.push("");
    for (const recommendation of exec.recommendations) {
      lines.push(`- ${recommendation}`);
    }
    lines.push("");
  } else {
    for (const section of report.sections) {
      lines.push(`## ${section.title}`);
      lines.push("");
      lines.push("```json");
      lines.push(JSON.stringify(section.payload, null, 2));
      lines.push("```");
      lines.push("");
    }
  }

  if (report.failure) {
    const { failure } = report;
    lines.push("## Failure");
    lines.push("");
    lines.push(
      `Task **${failure.taskId}** failed (${failure.code}) after ${failure.attempts} attempt(s): ${failure.message}`
    );
    lines.push("");
  } else if (report.status === "partial") {
    lines.push(`_Run cancelled after ${report.totals.tasks} task(s)._`);
    lines.push("");
  }

  lines.push("---");
  lines.push(
    `*${report.totals.tasks} task(s), ${report.totals.attempts} attempt(s), ${report.totals.promptTokens} prompt tokens*`
  );

  return lines.join("\n");
}
