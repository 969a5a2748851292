/**
 * Task Output Schemas
 * Structured output contracts for each step of the research pipeline.
 * Kept compact: the presets cap completions at a few hundred tokens.
 */

import { z } from "zod";

const level = z.enum(["low", "medium", "high"]);

/**
 * Step 1: primary market segments
 */
export const MarketSegmentsSchema = z.object({
  segments: z
    .array(
      z.object({
        name: z.string(),
        needs: z.string(),
        growthPotential: level,
      })
    )
    .min(1),
  summary: z.string(),
});

/**
 * Step 2: reports, papers and news worth building on
 */
export const MarketResearchSchema = z.object({
  sources: z
    .array(
      z.object({
        title: z.string(),
        type: z.enum(["report", "whitepaper", "research_paper", "news_article", "academic_study"]),
        keyFinding: z.string(),
      })
    )
    .min(1),
  themes: z.array(z.string()),
});

/**
 * Step 3: direct competitors
 */
export const CompetitorProfilesSchema = z.object({
  competitors: z
    .array(
      z.object({
        name: z.string(),
        offering: z.string(),
        targetSegments: z.array(z.string()),
        threatLevel: level,
      })
    )
    .min(1),
});

/**
 * Step 4: how competitors position themselves
 */
export const CompetitorPositioningSchema = z.object({
  positioning: z.array(
    z.object({
      competitor: z.string(),
      uniqueSellingPoints: z.array(z.string()),
      trustStance: z.string(),
    })
  ),
  gaps: z.array(z.string()),
});

/**
 * Step 5: disruptive technology trends
 */
export const TechTrendsSchema = z.object({
  trends: z
    .array(
      z.object({
        name: z.string(),
        impact: level,
        horizonYears: z.number().min(0).max(10),
        implication: z.string(),
      })
    )
    .min(1),
});

/**
 * Step 6: regulatory and ethical shifts
 */
export const RegulatoryShiftsSchema = z.object({
  shifts: z
    .array(
      z.object({
        framework: z.string(),
        region: z.string(),
        implication: z.string(),
      })
    )
    .min(1),
});

/**
 * Step 7: executive report compiled from every earlier step
 */
export const ExecutiveReportSchema = z.object({
  executiveSummary: z.string(),
  competitorLandscape: z.string(),
  emergingTechnology: z.string(),
  regulatoryOutlook: z.string(),
  recommendations: z.array(z.string()).min(1),
});

export type MarketSegments = z.infer<typeof MarketSegmentsSchema>;
export type MarketResearch = z.infer<typeof MarketResearchSchema>;
export type CompetitorProfiles = z.infer<typeof CompetitorProfilesSchema>;
export type CompetitorPositioning = z.infer<typeof CompetitorPositioningSchema>;
export type TechTrends = z.infer<typeof TechTrendsSchema>;
export type RegulatoryShifts = z.infer<typeof RegulatoryShiftsSchema>;
export type ExecutiveReport = z.infer<typeof ExecutiveReportSchema>;
