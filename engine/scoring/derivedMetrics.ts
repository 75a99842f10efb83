import {
  DEFECT_TYPES,
  type ConditionScore,
  type DefectType,
  type Detection,
  type Severity,
} from "@pavewise/contracts";

import { getPavementTables, type PavementTables, type TimelineEntry } from "./tables";

export type SeverityBreakdown = Record<DefectType, Record<Severity, number>>;

export type DefectStatistics = {
  total: number;
  byType: Record<DefectType, number>;
  bySeverity: Record<Severity, number>;
};

export type CostEstimate = {
  currency: "USD";
  expected: number;
  low: number;
  high: number;
  byType: Record<DefectType, number>;
};

export type PriorityItem = {
  rank: number;
  defectType: DefectType;
  severity: Severity;
  extent: number;
  confidence: number;
};

export type SuggestedTimeline = TimelineEntry & {
  rating: ConditionScore["rating"];
  summary: string;
};

const severityRank: Record<Severity, number> = { low: 1, medium: 2, high: 3 };

const roundCurrency = (value: number): number => Math.round(value * 100) / 100;

const zeroByType = (): Record<DefectType, number> => ({ pothole: 0, spalling: 0, patching: 0, marking: 0 });

const zeroBySeverity = (): Record<Severity, number> => ({ low: 0, medium: 0, high: 0 });

export function severityBreakdown(detections: ReadonlyArray<Detection>): SeverityBreakdown {
  const breakdown: SeverityBreakdown = {
    pothole: zeroBySeverity(),
    spalling: zeroBySeverity(),
    patching: zeroBySeverity(),
    marking: zeroBySeverity(),
  };

  for (const detection of detections) {
    breakdown[detection.defectType][detection.severity] += 1;
  }

  return breakdown;
}

export function defectStatistics(detections: ReadonlyArray<Detection>): DefectStatistics {
  const byType = zeroByType();
  const bySeverity = zeroBySeverity();

  for (const detection of detections) {
    byType[detection.defectType] += 1;
    bySeverity[detection.severity] += 1;
  }

  return { total: detections.length, byType, bySeverity };
}

export function estimatedCost(
  detections: ReadonlyArray<Detection>,
  tables: Readonly<PavementTables> = getPavementTables(),
): CostEstimate {
  const byType = zeroByType();

  for (const detection of detections) {
    byType[detection.defectType] += tables.unitCostsUsd[detection.defectType][detection.severity] * detection.extent;
  }

  const expected = DEFECT_TYPES.reduce((sum, defectType) => sum + byType[defectType], 0);

  return {
    currency: "USD",
    expected: roundCurrency(expected),
    low: roundCurrency(expected * (1 - tables.costUncertainty)),
    high: roundCurrency(expected * (1 + tables.costUncertainty)),
    byType: {
      pothole: roundCurrency(byType.pothole),
      spalling: roundCurrency(byType.spalling),
      patching: roundCurrency(byType.patching),
      marking: roundCurrency(byType.marking),
    },
  };
}

export function priorityList(
  detections: ReadonlyArray<Detection>,
  tables: Readonly<PavementTables> = getPavementTables(),
): PriorityItem[] {
  return [...detections]
    .sort(
      (a, b) =>
        severityRank[b.severity] - severityRank[a.severity] ||
        b.extent - a.extent ||
        DEFECT_TYPES.indexOf(a.defectType) - DEFECT_TYPES.indexOf(b.defectType) ||
        b.confidence - a.confidence,
    )
    .slice(0, tables.priorityListSize)
    .map((detection, index) => ({
      rank: index + 1,
      defectType: detection.defectType,
      severity: detection.severity,
      extent: detection.extent,
      confidence: detection.confidence,
    }));
}

export function suggestedTimeline(
  conditionScore: ConditionScore,
  tables: Readonly<PavementTables> = getPavementTables(),
): SuggestedTimeline {
  const entry = tables.timeline[conditionScore.rating];
  const summary =
    entry.horizon === "immediate"
      ? "Immediate repair required"
      : entry.horizon === "within_months"
        ? `Repair within ${entry.withinMonths} months`
        : "Routine maintenance";

  return {
    ...entry,
    rating: conditionScore.rating,
    summary: `${summary}; ${entry.reassessment} re-assessment`,
  };
}

export const formatUsd = (value: number): string => `$${Math.round(value).toLocaleString("en-US")}`;

export function buildRecommendations(
  detections: ReadonlyArray<Detection>,
  conditionScore: ConditionScore,
  tables: Readonly<PavementTables> = getPavementTables(),
): string[] {
  const timeline = suggestedTimeline(conditionScore, tables);
  const recommendations = [
    `${timeline.summary} (condition score ${conditionScore.score}, ${conditionScore.rating})`,
  ];

  const breakdown = severityBreakdown(detections);
  for (const defectType of DEFECT_TYPES) {
    const highCount = breakdown[defectType].high;
    if (highCount > 0) {
      recommendations.push(`Priority repair: ${highCount} high-severity ${defectType} defect(s)`);
    }
  }

  if (detections.length > 0) {
    const cost = estimatedCost(detections, tables);
    recommendations.push(`Estimated repair cost: ${formatUsd(cost.low)} - ${formatUsd(cost.high)}`);
  }

  return recommendations;
}
