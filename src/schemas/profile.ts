/**
 * Caller Profile Schema
 * The company record every task is personalized with, plus file utilities.
 * The record is produced elsewhere (questionnaire); the pipeline only reads it.
 */

import { z } from "zod";
import fs from "fs/promises";
import path from "path";
import { ProfileError } from "../core/errors.js";

const entry = z.string().trim().min(1);

export const CallerProfileSchema = z.object({
  companyName: entry,
  industry: entry,
  targetCustomers: z.array(entry).default([]),
  competitors: z.array(entry).default([]),
  strategicGoals: z.array(entry).default([]),
  challenges: z.array(entry).default([]),
  researchFocusAreas: z.array(entry).default([]),

  // Optional detail collected by the longer questionnaire
  companyDescription: z.string().optional(),
  productsServices: z.array(entry).optional(),
  businessModel: z.string().optional(),
  competitiveAdvantages: z.array(entry).optional(),
  marketPosition: z.string().optional(),

  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
});

export type CallerProfile = z.infer<typeof CallerProfileSchema>;

/**
 * Profile fields that can be injected into prompts
 */
export type ProfileField = Exclude<keyof CallerProfile, "createdAt" | "updatedAt">;

/**
 * Load a profile. A missing file is not an error: the pipeline then runs
 * without personalization.
 */
export async function loadProfile(filePath: string): Promise<CallerProfile | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw new ProfileError(
      `Could not read caller profile at ${filePath}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ProfileError(
      `Caller profile at ${filePath} is not valid JSON`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }

  const result = CallerProfileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors
      .map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`)
      .join("; ");
    throw new ProfileError(`Caller profile at ${filePath} is invalid: ${issues}`, filePath);
  }

  return result.data;
}

/**
 * Save a profile, stamping timestamps and creating parent directories
 */
export async function saveProfile(profile: CallerProfile, filePath: string): Promise<CallerProfile> {
  const now = new Date().toISOString();
  const stamped: CallerProfile = {
    ...profile,
    createdAt: profile.createdAt ?? now,
    updatedAt: now,
  };

  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(stamped, null, 2));
  return stamped;
}

/**
 * Check if a profile file exists
 */
export async function profileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Sample profile used by `profile init` as a starting point
 */
export function createSampleProfile(): CallerProfile {
  return {
    companyName: "Northwind Workflow",
    industry: "Enterprise Software",
    companyDescription:
      "A B2B SaaS company building workflow automation for mid-market operations teams.",
    targetCustomers: ["Mid-market enterprises", "Operations managers"],
    competitors: ["Zapier", "Microsoft Power Automate", "UiPath"],
    productsServices: ["Workflow automation platform", "Process analytics dashboard"],
    businessModel: "Tiered SaaS subscription",
    competitiveAdvantages: ["Enterprise-grade security", "Custom integrations"],
    marketPosition: "Emerging challenger",
    strategicGoals: ["Expand market share", "Launch AI-assisted features"],
    challenges: ["Brand recognition", "Long sales cycles"],
    researchFocusAreas: ["Competitive positioning", "Product differentiation"],
  };
}

/**
 * One-line description for CLI output
 */
export function summarizeProfile(profile: CallerProfile): string {
  const parts = [`${profile.companyName} (${profile.industry})`];
  if (profile.targetCustomers.length > 0) {
    parts.push(`Customers: ${profile.targetCustomers.join(", ")}`);
  }
  if (profile.competitors.length > 0) {
    parts.push(`Competitors: ${profile.competitors.join(", ")}`);
  }
  if (profile.strategicGoals.length > 0) {
    parts.push(`Goals: ${profile.strategicGoals.join(", ")}`);
  }
  return parts.join(" | ");
}
