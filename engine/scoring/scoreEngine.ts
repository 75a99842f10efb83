import {
  CONDITION_RATINGS,
  DEFECT_TYPES,
  DetectionSchema,
  SEVERITIES,
  type ConditionRating,
  type ConditionScore,
  type DefectType,
  type Detection,
  type Severity,
} from "@pavewise/contracts";

import { ValidationError, type ValidationIssue } from "../ai/errors";
import { getPavementTables, type CorrectionCurveKey, type CurvePoint, type PavementTables } from "./tables";

export type DeductValue = {
  defectType: DefectType;
  severity: Severity;
  density: number;
  value: number;
};

export type CorrectionIteration = {
  deducts: number[];
  q: number;
  totalDeduct: number;
  correctedDeduct: number;
};

export type ScoreResult = {
  conditionScore: ConditionScore;
  deductValues: DeductValue[];
  iterations: CorrectionIteration[];
  maxCorrectedDeduct: number;
};

const clamp = (value: number, min: number, max: number): number => Math.max(min, Math.min(max, value));

const correctionKeys: ReadonlyArray<CorrectionCurveKey> = ["2", "3", "4", "5", "6", "7"];

export function validateDetections(detections: ReadonlyArray<unknown>): Detection[] {
  const issues: ValidationIssue[] = [];
  const valid: Detection[] = [];

  detections.forEach((candidate, index) => {
    const parsed = DetectionSchema.safeParse(candidate);
    if (parsed.success) {
      valid.push(parsed.data);
      return;
    }
    for (const issue of parsed.error.issues) {
      issues.push({ path: [index, ...issue.path].join("."), message: issue.message });
    }
  });

  if (issues.length > 0) {
    throw new ValidationError(
      `Rejected ${issues.length} invalid detection field(s): ${issues.map((issue) => `${issue.path} ${issue.message}`).join("; ")}`,
      { subject: "detection", issues },
    );
  }

  return valid;
}

/**
 * Deduct value for one defect group. Curves are interpolated on log10(density)
 * between configured points and linearly from the origin below the first point.
 */
export function interpolateDeduct(curve: ReadonlyArray<CurvePoint>, density: number): number {
  const first = curve[0];
  const last = curve[curve.length - 1];
  if (!first || !last || density <= 0) {
    return 0;
  }
  if (density <= first.density) {
    return clamp((density / first.density) * first.deduct, 0, 100);
  }
  if (density >= last.density) {
    return clamp(last.deduct, 0, 100);
  }

  for (let index = 1; index < curve.length; index += 1) {
    const lower = curve[index - 1];
    const upper = curve[index];
    if (!lower || !upper || density > upper.density) {
      continue;
    }
    const span = Math.log10(upper.density) - Math.log10(lower.density);
    const ratio = (Math.log10(density) - Math.log10(lower.density)) / span;
    return clamp(lower.deduct + ratio * (upper.deduct - lower.deduct), 0, 100);
  }

  return clamp(last.deduct, 0, 100);
}

export function correctedDeduct(tables: Readonly<PavementTables>, q: number, totalDeduct: number): number {
  if (q <= 1) {
    return clamp(totalDeduct, 0, 100);
  }

  const key = correctionKeys[Math.min(q, 7) - 2] ?? "7";
  const curve = tables.correction.curves[key];
  const points = tables.correction.totalDeductPoints;

  for (let index = 1; index < points.length; index += 1) {
    const lowerTotal = points[index - 1] ?? 0;
    const upperTotal = points[index] ?? lowerTotal;
    if (totalDeduct > upperTotal) {
      continue;
    }
    const lowerCdv = curve[index - 1] ?? 0;
    const upperCdv = curve[index] ?? lowerCdv;
    const ratio = (totalDeduct - lowerTotal) / (upperTotal - lowerTotal);
    return clamp(lowerCdv + ratio * (upperCdv - lowerCdv), 0, 100);
  }

  return clamp(curve[curve.length - 1] ?? 100, 0, 100);
}

export function computeDeductValues(detections: ReadonlyArray<Detection>, tables: Readonly<PavementTables>): DeductValue[] {
  const extents = new Map<string, number[]>();
  for (const detection of detections) {
    const key = `${detection.defectType}:${detection.severity}`;
    extents.set(key, [...(extents.get(key) ?? []), detection.extent]);
  }

  const deducts: DeductValue[] = [];
  for (const defectType of DEFECT_TYPES) {
    for (const severity of SEVERITIES) {
      const groupExtents = extents.get(`${defectType}:${severity}`);
      if (!groupExtents) {
        continue;
      }
      // Summed in sorted order so the result never depends on input order.
      const totalExtent = [...groupExtents].sort((a, b) => a - b).reduce((sum, extent) => sum + extent, 0);
      const density = (totalExtent / tables.sampleUnitAreaM2) * 100;
      const value = interpolateDeduct(tables.deductCurves[defectType][severity], density);
      if (value > 0) {
        deducts.push({ defectType, severity, density, value });
      }
    }
  }

  return deducts.sort((a, b) => b.value - a.value);
}

function limitToAllowedDeducts(sorted: number[], tables: Readonly<PavementTables>): number[] {
  const highest = sorted[0] ?? 0;
  const allowed = Math.min(
    tables.correction.maxAllowedDeducts,
    1 + (9 / 98) * (100 - highest),
  );
  if (sorted.length <= allowed) {
    return sorted;
  }

  const whole = Math.floor(allowed);
  const kept = sorted.slice(0, whole);
  const fractional = allowed - whole;
  const next = sorted[whole];
  if (fractional > 0 && next !== undefined) {
    kept.push(next * fractional);
  }
  return kept;
}

/**
 * Corrected deduct value iteration. Deducts are sorted descending; each pass
 * records the CDV for the current list, then lowers the smallest deduct above
 * the minimum to the minimum, until at most one deduct exceeds it.
 */
export function runCorrection(deducts: number[], tables: Readonly<PavementTables>): CorrectionIteration[] {
  const { minimumDeduct, variant } = tables.correction;
  const sorted = [...deducts].sort((a, b) => b - a);
  if (sorted.length === 0) {
    return [];
  }

  const aboveMinimum = sorted.filter((value) => value > minimumDeduct).length;
  if (aboveMinimum <= 1) {
    const totalDeduct = sorted.reduce((sum, value) => sum + value, 0);
    return [{ deducts: sorted, q: aboveMinimum, totalDeduct, correctedDeduct: clamp(totalDeduct, 0, 100) }];
  }

  const working = variant === "astm-d6433" ? limitToAllowedDeducts(sorted, tables) : sorted;
  const iterations: CorrectionIteration[] = [];

  for (;;) {
    const q = working.filter((value) => value > minimumDeduct).length;
    const totalDeduct = working.reduce((sum, value) => sum + value, 0);
    iterations.push({
      deducts: [...working],
      q,
      totalDeduct,
      correctedDeduct: correctedDeduct(tables, q, totalDeduct),
    });

    if (q <= 1) {
      return iterations;
    }

    let smallestIndex = -1;
    working.forEach((value, index) => {
      if (value > minimumDeduct && (smallestIndex < 0 || value <= (working[smallestIndex] ?? value))) {
        smallestIndex = index;
      }
    });
    working[smallestIndex] = minimumDeduct;
  }
}

export function ratingForScore(score: number, tables: Readonly<PavementTables>): ConditionRating {
  const band = tables.ratingBands.find((candidate) => score >= candidate.minScore);
  return band?.rating ?? CONDITION_RATINGS[0];
}

export function scoreDetections(
  detections: ReadonlyArray<unknown>,
  tables: Readonly<PavementTables> = getPavementTables(),
): ScoreResult {
  const valid = validateDetections(detections);
  const deductValues = computeDeductValues(valid, tables);
  const iterations = runCorrection(
    deductValues.map((deduct) => deduct.value),
    tables,
  );
  const maxCorrectedDeduct = iterations.reduce((max, iteration) => Math.max(max, iteration.correctedDeduct), 0);
  const score = clamp(Math.round(100 - maxCorrectedDeduct), 0, 100);

  return {
    conditionScore: { score, rating: ratingForScore(score, tables) },
    deductValues,
    iterations,
    maxCorrectedDeduct,
  };
}

export const computeConditionScore = (
  detections: ReadonlyArray<unknown>,
  tables: Readonly<PavementTables> = getPavementTables(),
): ConditionScore => scoreDetections(detections, tables).conditionScore;

export const ratingRank = (rating: ConditionRating): number => CONDITION_RATINGS.indexOf(rating);
