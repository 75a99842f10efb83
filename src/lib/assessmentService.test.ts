import assert from "node:assert/strict";
import test, { mock } from "node:test";

import type { RawDetection } from "@pavewise/contracts";

import { GenerationError, ValidationError } from "../../engine/ai/errors";
import type { LanguageModel } from "../../engine/ai/languageModel";
import { WorkflowEngine } from "../../engine/ai/workflowEngine";
import { getPavementTables } from "../../engine/scoring/tables";
import { createAssessmentGraph } from "../../engine/workflows/assessmentPipeline";
import type { Detector } from "../../engine/workflows/detections";
import { SqliteAssessmentRepository } from "./assessmentPersistence";
import { submitAssessment } from "./assessmentService";
import { openDatabase } from "./db/client";

mock.method(console, "info", () => undefined);
mock.method(console, "warn", () => undefined);

const tables = getPavementTables();
const bbox = { x: 0, y: 0, width: 90, height: 100 };

const boxes: RawDetection[] = [
  { label: "apothole", confidence: 0.9, bbox, areaPixels: 9000 },
  { label: "spalling", confidence: 0.7, bbox, areaPixels: 6000 },
];

const setup = (detector: Detector, languageModel: LanguageModel) => {
  const handle = openDatabase(":memory:");
  const repository = new SqliteAssessmentRepository(handle.db, { generateId: () => "asm-1" });
  const deps = {
    engine: new WorkflowEngine(),
    graph: createAssessmentGraph({ detector, languageModel, tables }),
    repository,
    tables,
  };
  return { handle, repository, deps };
};

const detectorFor = (raw: RawDetection[]): Detector => ({ detect: async () => raw });

test("a clean run is stored and returned as completed", async () => {
  const { handle, repository, deps } = setup(detectorFor(boxes), { generate: async () => "Model narrative." });

  const response = await submitAssessment({ imageReference: "img-1", location: "Elm Rd" }, deps);

  assert.equal(response.status, "completed");
  assert.ok(response.assessment);
  assert.equal(response.assessment.analysisText, "Model narrative.");
  assert.equal(response.assessment.analysisSource, "model");
  assert.equal(response.assessment.location, "Elm Rd");
  assert.deepEqual(response.assessment.stageErrors, []);
  assert.deepEqual(
    response.assessment.detections.map((detection) => [detection.defectType, detection.severity, detection.extent]),
    [
      ["pothole", "high", 1],
      ["spalling", "medium", 0.15],
    ],
  );
  assert.deepEqual(await repository.getAssessment("asm-1"), response.assessment);
  handle.sqlite.close();
});

test("an Analyze failure is stored as partial with a rule-based narrative", async () => {
  const { handle, deps } = setup(detectorFor(boxes), {
    generate: async () => {
      throw new GenerationError("Language model test-model failed");
    },
  });

  const response = await submitAssessment({ imageReference: "img-1" }, deps);

  assert.equal(response.status, "partial");
  assert.ok(response.assessment);
  assert.equal(response.assessment.analysisSource, "rule_based");
  assert.equal(response.assessment.location, null);
  assert.deepEqual(response.assessment.stageErrors, [
    { stage: "Analyze", message: "Language model test-model failed" },
  ]);
  const lines = response.assessment.analysisText.split("\n");
  assert.equal(lines[0], "Pavement Assessment Report");
  assert.equal(lines[lines.length - 1], "Generated without the language model: Language model test-model failed");
  assert.ok(response.assessment.recommendations.length > 0);
  handle.sqlite.close();
});

test("a detector failure returns no assessment and stores nothing", async () => {
  const { handle, deps } = setup(
    {
      detect: async () => {
        throw new Error("unreadable image");
      },
    },
    { generate: async () => "unused" },
  );

  const response = await submitAssessment({ imageReference: "img-broken" }, deps);

  assert.equal(response.status, "failed");
  assert.equal(response.assessment, null);
  assert.deepEqual(
    response.stageLog.map((entry) => [entry.stage, entry.status]),
    [["Detect", "failed"]],
  );
  assert.deepEqual(handle.sqlite.prepare("SELECT COUNT(*) AS n FROM assessments").get(), { n: 0 });
  handle.sqlite.close();
});

test("rejects a request without an image reference", async () => {
  const { handle, deps } = setup(detectorFor(boxes), { generate: async () => "unused" });

  await assert.rejects(
    () => submitAssessment({ imageReference: "" }, deps),
    (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.equal(error.details.subject, "request");
      assert.deepEqual(
        error.details.issues.map((issue) => issue.path),
        ["imageReference"],
      );
      return true;
    },
  );
  handle.sqlite.close();
});
