import assert from "node:assert/strict";
import test from "node:test";

import type { RawDetection } from "@pavewise/contracts";

import { getPavementTables } from "../scoring/tables";
import { normalizeDetections } from "./detections";

const tables = getPavementTables();
const bbox = { x: 10, y: 20, width: 100, height: 90 };

const box = (label: string, confidence: number, areaPixels: number): RawDetection => ({
  label,
  confidence,
  bbox,
  areaPixels,
});

test("maps model labels through the alias table and derives severity from area", () => {
  const detections = normalizeDetections(
    [box("apothole", 0.91, 9000), box("Spalling", 0.6, 5000), box("rm", 0.5, 100), box("patch", 0.8, 12000)],
    tables,
  );

  assert.deepEqual(detections, [
    { defectType: "pothole", severity: "high", extent: 1, confidence: 0.91, bbox },
    { defectType: "spalling", severity: "medium", extent: 0.125, confidence: 0.6, bbox },
    { defectType: "marking", severity: "low", extent: 0.0025, confidence: 0.5, bbox },
    { defectType: "patching", severity: "medium", extent: 0.3, confidence: 0.8, bbox },
  ]);
});

test("drops unknown labels and boxes below the confidence threshold", () => {
  const raw = [box("crack", 0.9, 5000), box("pothole", 0.2, 5000), box("pothole", 0.25, 100)];

  assert.deepEqual(
    normalizeDetections(raw, tables).map((detection) => [detection.defectType, detection.severity]),
    [["pothole", "low"]],
  );
  assert.equal(normalizeDetections(raw, tables, { confidenceThreshold: 0.1 }).length, 2);
});

test("passes out-of-range confidences through for scoring to reject", () => {
  assert.equal(normalizeDetections([box("pothole", 1.4, 100)], tables)[0]?.confidence, 1.4);
});
