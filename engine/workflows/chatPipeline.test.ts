import assert from "node:assert/strict";
import test from "node:test";

import type { Assessment } from "@pavewise/contracts";

import { GenerationError, QueryError } from "../ai/errors";
import type { GenerationContext, LanguageModel } from "../ai/languageModel";
import { WorkflowEngine } from "../ai/workflowEngine";
import { getPavementTables } from "../scoring/tables";
import {
  buildToolBasedAnswer,
  createChatGraph,
  needsStructuredQuery,
  runChatPipeline,
  type QueryExecutor,
  type QueryRow,
} from "./chatPipeline";

const assessment: Assessment = {
  id: "asm-1",
  imageReference: "img-1",
  location: "Main St",
  detections: [
    { defectType: "pothole", severity: "high", extent: 5, confidence: 0.91 },
    { defectType: "patching", severity: "low", extent: 2, confidence: 0.77 },
    { defectType: "marking", severity: "low", extent: 1, confidence: 0.64 },
  ],
  conditionScore: { score: 34, rating: "Poor" },
  analysisText: "Poor section.",
  analysisSource: "model",
  recommendations: ["Repair within 3 months; monthly re-assessment (condition score 34, Poor)"],
  stageErrors: [],
  createdAt: "2026-01-05T10:00:00.000Z",
};

class ScriptedModel implements LanguageModel {
  readonly calls: Array<{ prompt: string; context: GenerationContext }> = [];

  constructor(private readonly replies: Array<() => Promise<string>>) {}

  async generate(prompt: string, context: GenerationContext): Promise<string> {
    this.calls.push({ prompt, context });
    const next = this.replies.shift();
    if (!next) {
      throw new Error("no scripted reply left");
    }
    return next();
  }
}

class RecordingExecutor implements QueryExecutor {
  readonly calls: Array<{ query: string; scopeId: string }> = [];

  constructor(private readonly result: () => Promise<QueryRow[]>) {}

  async executeReadOnly(query: string, scopeId: string): Promise<QueryRow[]> {
    this.calls.push({ query, scopeId });
    return this.result();
  }
}

const stageSummary = (log: ReadonlyArray<{ stage: string; status: string; errorName?: string }>) =>
  log.map((entry) => [entry.stage, entry.status, entry.errorName ?? null]);

const run = (model: LanguageModel, executor: QueryExecutor, question: string) =>
  runChatPipeline(new WorkflowEngine(), createChatGraph({ languageModel: model, queryExecutor: executor }), {
    question,
    assessment,
    history: [{ question: "Score?", answer: "34" }],
  });

const scopedCount = "SELECT COUNT(*) AS n FROM defects WHERE assessment_id = :assessment_id AND severity = 'high'";

test("classifies questions that need structured data", () => {
  assert.equal(needsStructuredQuery("How many potholes are there?"), true);
  assert.equal(needsStructuredQuery("List the high severity defects"), true);
  assert.equal(needsStructuredQuery("Is this road safe to drive on?"), false);
  assert.equal(needsStructuredQuery("Explain the rating"), false);
});

test("general questions go straight to ComposeAnswer", async () => {
  const model = new ScriptedModel([async () => "It needs repair soon."]);
  const executor = new RecordingExecutor(async () => []);

  const state = await run(model, executor, "Is this road safe to drive on?");

  assert.deepEqual(stageSummary(state.log), [
    ["ClassifyIntent", "succeeded", null],
    ["ComposeAnswer", "succeeded", null],
  ]);
  assert.equal(state.results.ComposeAnswer?.answer, "It needs repair soon.");
  assert.deepEqual(model.calls[0]?.context.history, [{ question: "Score?", answer: "34" }]);
  assert.equal(executor.calls.length, 0);
});

test("data questions generate, validate and execute a scoped query", async () => {
  const model = new ScriptedModel([async () => `\`\`\`sql\n${scopedCount};\n\`\`\``, async () => "There is one."]);
  const executor = new RecordingExecutor(async () => [{ n: 1 }]);

  const state = await run(model, executor, "How many high severity potholes are there?");

  assert.deepEqual(stageSummary(state.log), [
    ["ClassifyIntent", "succeeded", null],
    ["GenerateQuery", "succeeded", null],
    ["ValidateQuery", "succeeded", null],
    ["Execute", "succeeded", null],
    ["ComposeAnswer", "succeeded", null],
  ]);
  assert.deepEqual(executor.calls, [{ query: scopedCount, scopeId: "asm-1" }]);
  assert.equal(state.results.ComposeAnswer?.answer, "There is one.");

  const data = model.calls[1]?.context.data;
  assert.ok(data && typeof data === "object" && "queryResult" in data);
  assert.deepEqual(data.queryResult, [{ n: 1 }]);
});

test("a generated mutation never reaches the executor", async () => {
  const model = new ScriptedModel([async () => "DELETE FROM defects WHERE assessment_id = :assessment_id"]);
  const executor = new RecordingExecutor(async () => []);

  const state = await run(model, executor, "Show all defects");

  assert.deepEqual(stageSummary(state.log), [
    ["ClassifyIntent", "succeeded", null],
    ["GenerateQuery", "succeeded", null],
    ["ValidateQuery", "failed", "ValidationError"],
  ]);
  assert.equal(state.fatal, true);
  assert.equal(executor.calls.length, 0);
  assert.equal(model.calls.length, 1);
});

test("executor failure is answered as an empty result set", async () => {
  const model = new ScriptedModel([async () => scopedCount, async () => "No rows came back."]);
  const executor = new RecordingExecutor(async () => {
    throw new QueryError("database is locked");
  });

  const state = await run(model, executor, "Count the defects");

  assert.deepEqual(stageSummary(state.log).slice(3), [
    ["Execute", "failed", "QueryError"],
    ["ComposeAnswer", "succeeded", null],
  ]);
  assert.equal(state.degraded, true);
  const data = model.calls[1]?.context.data;
  assert.ok(data && typeof data === "object" && "queryResult" in data);
  assert.deepEqual(data.queryResult, []);
});

test("query generation failure falls through to ComposeAnswer without a query", async () => {
  const model = new ScriptedModel([
    async () => {
      throw new GenerationError("Language model test-model failed");
    },
    async () => "Answered from the assessment.",
  ]);
  const executor = new RecordingExecutor(async () => []);

  const state = await run(model, executor, "Find the worst defect");

  assert.deepEqual(stageSummary(state.log), [
    ["ClassifyIntent", "succeeded", null],
    ["GenerateQuery", "failed", "GenerationError"],
    ["ComposeAnswer", "succeeded", null],
  ]);
  assert.equal(executor.calls.length, 0);
});

test("tool-based answers pick a metric by question keywords", () => {
  const tables = getPavementTables();

  assert.equal(
    buildToolBasedAnswer("What will this cost?", assessment, tables),
    "Estimated repair cost: $3,500 (range $2,800 - $4,200)\n- pothole: $3,000\n- patching: $200\n- marking: $300",
  );
  assert.equal(
    buildToolBasedAnswer("Which repairs come first?", assessment, tables),
    [
      "Priority repairs:",
      "1. pothole (high severity, extent 5, confidence 0.91)",
      "2. patching (low severity, extent 2, confidence 0.77)",
      "3. marking (low severity, extent 1, confidence 0.64)",
    ].join("\n"),
  );
  assert.equal(
    buildToolBasedAnswer("When should crews go out?", assessment, tables),
    "Repair within 3 months; monthly re-assessment for a Poor rating (score 34).",
  );
  assert.equal(
    buildToolBasedAnswer("Give me an overview", assessment, tables),
    "Total defects: 3\nBy type: pothole 1, patching 1, marking 1\nBy severity: low 2, high 1",
  );
  assert.equal(
    buildToolBasedAnswer("Is it safe?", assessment, tables),
    "Condition score 34 (Poor) with 3 detected defect(s). Recommendations: Repair within 3 months; monthly re-assessment (condition score 34, Poor)",
  );
});
