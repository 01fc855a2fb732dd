// ============================================
// Engine File
//
// JSON description of the assets, venues, oracle tables and strategies the
// keeper loads at startup. Amounts are human-readable decimal strings in
// the asset's units unless noted otherwise.
// ============================================

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { errorMessage, OrchestrationKind, ValidationError, VenueKind } from "@idleflow/common";

const decimalAmount = z.string().regex(/^\d+(\.\d+)?$/, "expected a non-negative decimal string");
const bps = z.number().int().min(0).max(10_000);

export const MarketSchema = z.object({
  utilizationBps: bps,
  yieldBps: z.number().int(),
  liquidityDepth: decimalAmount.default("0"),
});

export const VenueSchema = z.object({
  venueId: z.string().min(1),
  kind: z.nativeEnum(VenueKind),
  name: z.string().optional(),
  // Base units
  maxCapacity: z.string().regex(/^\d+$/, "expected an integer string").optional(),
  markets: z.record(MarketSchema).default({}),
});

export const AssetSchema = z.object({
  assetId: z.string().min(1),
  symbol: z.string().min(1),
  decimals: z.number().int().min(0).max(36),
  idleThreshold: decimalAmount,
  minReallocationAmount: decimalAmount,
  utilizationThresholdBps: bps.optional(),
  timeThresholdMs: z.number().int().nonnegative().optional(),
  targetWeights: z.record(bps),
  rateLimit: z
    .object({
      cooldownMs: z.number().int().nonnegative().optional(),
      maxReallocationPctBps: bps.optional(),
    })
    .optional(),
  priceUsd: z.number().positive().optional(),
  // Dry run only: capital deposited at startup
  seedDeposit: decimalAmount.optional(),
});

export const RiskSchema = z.object({
  venue: z.string().min(1),
  asset: z.string().optional(),
  risk: z.number().min(0).max(100),
});

export const StrategySchema = z.object({
  name: z.string().min(1),
  asset: z.string().min(1),
  sourceVenues: z.array(z.string()).min(1),
  targetVenues: z.array(z.string()).min(1),
  targetWeights: z.array(z.number().int()),
  minYieldImprovement: z.number().int().nonnegative(),
  maxRiskIncrease: z.number().min(0).max(100),
  executionFrequencyMs: z.number().int().positive(),
  orchestration: z.nativeEnum(OrchestrationKind).optional(),
  isAdaptive: z.boolean().optional(),
  active: z.boolean().optional(),
});

export const EngineFileSchema = z
  .object({
    assets: z.array(AssetSchema).min(1),
    venues: z.array(VenueSchema).min(1),
    risks: z.array(RiskSchema).default([]),
    strategies: z.array(StrategySchema).default([]),
  })
  .superRefine((file, ctx) => {
    const assets = new Set(file.assets.map((a) => a.assetId));
    file.venues.forEach((venue, i) => {
      for (const asset of Object.keys(venue.markets)) {
        if (!assets.has(asset)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["venues", i, "markets", asset],
            message: `unknown asset ${asset}`,
          });
        }
      }
    });
  });

export type EngineFile = z.infer<typeof EngineFileSchema>;
export type EngineFileAsset = z.infer<typeof AssetSchema>;
export type EngineFileVenue = z.infer<typeof VenueSchema>;

export function parseEngineFile(raw: unknown): EngineFile {
  const result = EngineFileSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(`Invalid engine file: ${errors.join("; ")}`, errors);
  }
  return result.data;
}

export async function loadEngineFile(path: string): Promise<EngineFile> {
  const text = await readFile(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`Engine file ${path} is not valid JSON: ${errorMessage(err)}`);
  }
  return parseEngineFile(raw);
}
