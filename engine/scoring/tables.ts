import { readFileSync } from "node:fs";

import {
  CONDITION_RATINGS,
  ConditionRatingSchema,
  DEFECT_TYPES,
  DefectTypeSchema,
  SEVERITIES,
  type ConditionRating,
} from "@pavewise/contracts";
import { z } from "zod";

import { ConfigurationError } from "../ai/errors";

const perDefectType = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({ pothole: schema, spalling: schema, patching: schema, marking: schema });

const perSeverity = <T extends z.ZodTypeAny>(schema: T) => z.object({ low: schema, medium: schema, high: schema });

const perRating = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({
    Failed: schema,
    "Very Poor": schema,
    Poor: schema,
    Fair: schema,
    Satisfactory: schema,
    Good: schema,
    "Very Good": schema,
    Excellent: schema,
  });

const CurvePointSchema = z.object({
  density: z.number().positive(),
  deduct: z.number().min(0).max(100),
});

const CorrectionCurveSchema = z.array(z.number().min(0).max(100));

export const CorrectionVariantSchema = z.enum(["astm-d6433", "reduce-to-two"]);

export const PavementTablesSchema = z.object({
  version: z.string().min(1),
  sampleUnitAreaM2: z.number().positive(),
  groundSamplingDistanceM: z.number().positive(),
  detectorConfidenceThreshold: z.number().min(0).max(1),
  labelAliases: z.record(z.string(), DefectTypeSchema),
  severityThresholdsPx: perDefectType(z.object({ medium: z.number().nonnegative(), high: z.number().nonnegative() })),
  deductCurves: perDefectType(perSeverity(z.array(CurvePointSchema).min(1))),
  correction: z.object({
    variant: CorrectionVariantSchema,
    minimumDeduct: z.number().nonnegative(),
    maxAllowedDeducts: z.number().int().positive(),
    totalDeductPoints: z.array(z.number().nonnegative()).min(2),
    curves: z.object({
      "2": CorrectionCurveSchema,
      "3": CorrectionCurveSchema,
      "4": CorrectionCurveSchema,
      "5": CorrectionCurveSchema,
      "6": CorrectionCurveSchema,
      "7": CorrectionCurveSchema,
    }),
  }),
  ratingBands: z.array(z.object({ rating: ConditionRatingSchema, minScore: z.number().int().min(0).max(100) })),
  unitCostsUsd: perDefectType(perSeverity(z.number().nonnegative())),
  costUncertainty: z.number().min(0).max(1),
  priorityListSize: z.number().int().positive(),
  timeline: perRating(
    z.object({
      horizon: z.enum(["immediate", "within_months", "routine"]),
      withinMonths: z.number().int().nonnegative(),
      reassessment: z.enum(["weekly", "monthly", "quarterly"]),
    }),
  ),
});

export type PavementTables = z.infer<typeof PavementTablesSchema>;
export type CorrectionVariant = z.infer<typeof CorrectionVariantSchema>;
export type CurvePoint = z.infer<typeof CurvePointSchema>;
export type CorrectionCurveKey = keyof PavementTables["correction"]["curves"];
export type TimelineEntry = PavementTables["timeline"][ConditionRating];

const isNonDecreasing = (values: number[]): boolean => values.every((value, index) => index === 0 || value >= (values[index - 1] ?? value));

const isIncreasing = (values: number[]): boolean => values.every((value, index) => index === 0 || value > (values[index - 1] ?? -Infinity));

function checkCurves(tables: PavementTables): string[] {
  const problems: string[] = [];

  for (const defectType of DEFECT_TYPES) {
    for (const severity of SEVERITIES) {
      const curve = tables.deductCurves[defectType][severity];
      if (!isIncreasing(curve.map((point) => point.density))) {
        problems.push(`deductCurves.${defectType}.${severity} densities must be strictly increasing`);
      }
      if (!isNonDecreasing(curve.map((point) => point.deduct))) {
        problems.push(`deductCurves.${defectType}.${severity} deducts must be non-decreasing`);
      }
    }

    const thresholds = tables.severityThresholdsPx[defectType];
    if (thresholds.high < thresholds.medium) {
      problems.push(`severityThresholdsPx.${defectType}.high must not be below medium`);
    }
  }

  const { totalDeductPoints, curves } = tables.correction;
  if (!isIncreasing(totalDeductPoints)) {
    problems.push("correction.totalDeductPoints must be strictly increasing");
  }
  for (const [key, curve] of Object.entries(curves)) {
    if (curve.length !== totalDeductPoints.length) {
      problems.push(`correction.curves.${key} must have ${totalDeductPoints.length} points`);
    }
    if (!isNonDecreasing(curve)) {
      problems.push(`correction.curves.${key} must be non-decreasing`);
    }
  }

  return problems;
}

function checkRatingBands(tables: PavementTables): string[] {
  const bands = tables.ratingBands;
  const problems: string[] = [];
  const expected = [...CONDITION_RATINGS].reverse();

  if (bands.map((band) => band.rating).join("|") !== expected.join("|")) {
    problems.push(`ratingBands must list every rating from best to worst: ${expected.join(", ")}`);
  }
  if (!isIncreasing([...bands].reverse().map((band) => band.minScore))) {
    problems.push("ratingBands minScore must decrease from best to worst rating");
  }
  if (bands[bands.length - 1]?.minScore !== 0) {
    problems.push("the worst rating band must start at 0");
  }

  return problems;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export function parsePavementTables(raw: unknown): Readonly<PavementTables> {
  const parsed = PavementTablesSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`[config] Invalid pavement tables: ${issues.join("; ")}`);
  }

  const problems = [...checkCurves(parsed.data), ...checkRatingBands(parsed.data)];
  if (problems.length > 0) {
    throw new ConfigurationError(`[config] Invalid pavement tables: ${problems.join("; ")}`);
  }

  return deepFreeze(parsed.data);
}

export const DEFAULT_TABLES_URL = new URL("./pavementTables.json", import.meta.url);

export function loadPavementTables(source: URL | string = DEFAULT_TABLES_URL): Readonly<PavementTables> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(source, "utf8"));
  } catch (error) {
    throw new ConfigurationError(
      `[config] Unable to read pavement tables from ${String(source)}: ${error instanceof Error ? error.message : "unknown error"}`,
    );
  }

  return parsePavementTables(raw);
}

let defaultTables: Readonly<PavementTables> | null = null;

// Loaded once per process and shared by reference across runs.
export function getPavementTables(): Readonly<PavementTables> {
  if (!defaultTables) {
    defaultTables = loadPavementTables();
  }
  return defaultTables;
}
