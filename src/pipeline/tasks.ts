/**
 * Task definitions
 * The ordered research steps and the checks every task list must pass
 * before a run starts.
 */

import type { z } from "zod";
import type { AgentRole } from "../agents/personas.js";
import { ConfigError } from "../core/errors.js";
import type { ProfileField } from "../schemas/profile.js";
import {
  CompetitorPositioningSchema,
  CompetitorProfilesSchema,
  ExecutiveReportSchema,
  MarketResearchSchema,
  MarketSegmentsSchema,
  RegulatoryShiftsSchema,
  TechTrendsSchema,
} from "../schemas/tasks.js";
import { listPlaceholders, TOPIC_PLACEHOLDER } from "./template.js";

export interface TaskSpec {
  id: string;
  title: string;
  agent: AgentRole;
  /** Task description; see template.ts for placeholders */
  template: string;
  outputSchema: z.ZodTypeAny;
  contextFields: readonly ProfileField[];
  /** Maximum tokens the injected context block may add */
  contextShare: number;
  maxRetries: number;
}

export const DEFAULT_MAX_RETRIES = 2;

type TaskDefinition = Omit<TaskSpec, "maxRetries">;

const DEFAULT_TASK_DEFINITIONS: readonly TaskDefinition[] = [
  {
    id: "market-segments",
    title: "Market segments",
    agent: "archivist",
    template:
      "Identify the primary market segments within the {{topic}} industry. For each segment give a brief overview of its specific needs and rate its growth potential.",
    outputSchema: MarketSegmentsSchema,
    contextFields: ["companyName", "industry", "targetCustomers"],
    contextShare: 120,
  },
  {
    id: "market-research",
    title: "Market research",
    agent: "archivist",
    template: `Collect the most relevant recent industry reports, whitepapers, research papers and news on the {{topic}} market. Focus on adoption within these segments, technological advances, implementation challenges and investment trends.
Segments: {{market-segments}}`,
    outputSchema: MarketResearchSchema,
    contextFields: ["companyName", "industry", "researchFocusAreas"],
    contextShare: 120,
  },
  {
    id: "competitor-profiles",
    title: "Competitor profiles",
    agent: "shadow",
    template: `Based on the market research below, profile the top 3-5 direct competitors in the {{topic}} space: their key products, target segments and threat level.
Research: {{market-research}}`,
    outputSchema: CompetitorProfilesSchema,
    contextFields: ["companyName", "industry", "competitors"],
    contextShare: 150,
  },
  {
    id: "competitor-positioning",
    title: "Competitor positioning",
    agent: "shadow",
    template: `Examine the messaging and positioning of these competitors. Identify their unique selling points and their stance on data privacy and compliance, then list positioning gaps we could exploit.
Competitors: {{competitor-profiles}}`,
    outputSchema: CompetitorPositioningSchema,
    contextFields: ["companyName", "competitors", "competitiveAdvantages", "marketPosition"],
    contextShare: 150,
  },
  {
    id: "tech-trends",
    title: "Technology trends",
    agent: "seer",
    template: `Using the research below, pinpoint 3-5 technological advancements with the highest potential to disrupt the {{topic}} market in the next 1-3 years.
Research: {{market-research}}`,
    outputSchema: TechTrendsSchema,
    contextFields: ["companyName", "industry", "productsServices", "researchFocusAreas"],
    contextShare: 120,
  },
  {
    id: "regulatory-shifts",
    title: "Regulatory shifts",
    agent: "seer",
    template: `Identify 2-3 emerging regulatory frameworks or ethical considerations affecting the {{topic}} market and their implications for us and our clients.
Research: {{market-research}}`,
    outputSchema: RegulatoryShiftsSchema,
    contextFields: ["companyName", "industry", "targetCustomers", "challenges"],
    contextShare: 120,
  },
  {
    id: "executive-report",
    title: "Executive report",
    agent: "nexus",
    template: `Compile the findings below into a concise C-level executive report on the {{topic}} market with actionable recommendations.
Segments: {{market-segments}}
Research: {{market-research}}
Competitors: {{competitor-profiles}}
Positioning: {{competitor-positioning}}
Trends: {{tech-trends}}
Regulation: {{regulatory-shifts}}`,
    outputSchema: ExecutiveReportSchema,
    contextFields: ["companyName", "industry", "strategicGoals", "challenges", "researchFocusAreas"],
    contextShare: 200,
  },
];

/**
 * The default seven-step research sequence
 */
export function createDefaultTasks(maxRetries: number = DEFAULT_MAX_RETRIES): TaskSpec[] {
  return DEFAULT_TASK_DEFINITIONS.map((definition) => ({ ...definition, maxRetries }));
}

/**
 * Reject task lists that could not run to completion
 */
export function validateTaskSpecs(tasks: readonly TaskSpec[]): void {
  if (tasks.length === 0) {
    throw new ConfigError("Task list is empty");
  }

  const seen = new Set<string>();

  tasks.forEach((task, index) => {
    if (seen.has(task.id)) {
      throw new ConfigError(`Duplicate task id '${task.id}'`, { taskId: task.id, index });
    }
    if (task.id === TOPIC_PLACEHOLDER) {
      throw new ConfigError(`Task id '${task.id}' is reserved`, { taskId: task.id, index });
    }

    for (const name of listPlaceholders(task.template)) {
      if (name !== TOPIC_PLACEHOLDER && !seen.has(name)) {
        throw new ConfigError(
          `Task '${task.id}' references '${name}', which is not an earlier task`,
          { taskId: task.id, index, placeholder: name }
        );
      }
    }

    if (!Number.isFinite(task.contextShare) || task.contextShare < 0) {
      throw new ConfigError(`Task '${task.id}' has an invalid context share: ${task.contextShare}`, {
        taskId: task.id,
      });
    }
    if (!Number.isInteger(task.maxRetries) || task.maxRetries < 0) {
      throw new ConfigError(`Task '${task.id}' has an invalid retry count: ${task.maxRetries}`, {
        taskId: task.id,
      });
    }

    seen.add(task.id);
  });
}
