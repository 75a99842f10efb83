import type { DefectType, Detection, RawDetection, Severity } from "@pavewise/contracts";

import type { PavementTables } from "../scoring/tables";

export type DetectOptions = {
  signal?: AbortSignal;
};

/** Object-detection collaborator: image reference in, raw boxes out. */
export interface Detector {
  detect(imageReference: string, options?: DetectOptions): Promise<RawDetection[]>;
}

export type NormalizeOptions = {
  confidenceThreshold?: number;
};

const resolveDefectType = (label: string, tables: Readonly<PavementTables>): DefectType | null =>
  tables.labelAliases[label.trim().toLowerCase()] ?? null;

function severityFromArea(defectType: DefectType, areaPixels: number, tables: Readonly<PavementTables>): Severity {
  const thresholds = tables.severityThresholdsPx[defectType];
  if (areaPixels >= thresholds.high) {
    return "high";
  }
  if (areaPixels >= thresholds.medium) {
    return "medium";
  }
  return "low";
}

// Potholes are counted; every other type is measured in square metres.
function extentFor(defectType: DefectType, areaPixels: number, tables: Readonly<PavementTables>): number {
  if (defectType === "pothole") {
    return 1;
  }
  const squareMetres = areaPixels * tables.groundSamplingDistanceM ** 2;
  return Math.round(squareMetres * 10_000) / 10_000;
}

/**
 * Maps raw detector boxes onto Detections. Unknown labels and boxes below the
 * confidence threshold are dropped; out-of-range confidences are passed through
 * so the Score stage rejects them.
 */
export function normalizeDetections(
  raw: ReadonlyArray<RawDetection>,
  tables: Readonly<PavementTables>,
  options: NormalizeOptions = {},
): Detection[] {
  const threshold = options.confidenceThreshold ?? tables.detectorConfidenceThreshold;
  const detections: Detection[] = [];

  for (const box of raw) {
    const defectType = resolveDefectType(box.label, tables);
    if (!defectType || box.confidence < threshold) {
      continue;
    }

    detections.push({
      defectType,
      severity: severityFromArea(defectType, box.areaPixels, tables),
      extent: extentFor(defectType, box.areaPixels, tables),
      confidence: box.confidence,
      bbox: box.bbox,
    });
  }

  return detections;
}
