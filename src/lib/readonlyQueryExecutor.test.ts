import assert from "node:assert/strict";
import test from "node:test";

import { QueryError } from "../../engine/ai/errors";
import { SqliteAssessmentRepository } from "./assessmentPersistence";
import { openDatabase } from "./db/client";
import { SqliteReadonlyQueryExecutor, scopeQuery } from "./readonlyQueryExecutor";

const setup = async () => {
  const handle = openDatabase(":memory:");
  let sequence = 0;
  const repository = new SqliteAssessmentRepository(handle.db, { generateId: () => `asm-${(sequence += 1)}` });
  const base = {
    location: null,
    conditionScore: { score: 34, rating: "Poor" as const },
    analysisText: "text",
    analysisSource: "model" as const,
    recommendations: [],
    stageErrors: [],
  };

  await repository.createAssessment({
    ...base,
    imageReference: "img-1",
    detections: [
      { defectType: "pothole", severity: "high", extent: 5, confidence: 0.91 },
      { defectType: "patching", severity: "low", extent: 2, confidence: 0.77 },
    ],
  });
  await repository.createAssessment({
    ...base,
    imageReference: "img-2",
    detections: [{ defectType: "marking", severity: "low", extent: 1, confidence: 0.64 }],
  });
  await repository.appendChatMessage({
    assessmentId: "asm-2",
    question: "Where is the marking?",
    generatedQuery: null,
    answer: "Near the crossing.",
  });

  return { handle, executor: new SqliteReadonlyQueryExecutor(handle.sqlite, 1) };
};

const scoped = "SELECT defect_type, severity FROM defects WHERE assessment_id = :assessment_id ORDER BY position";

test("binds the scope id so only that assessment's rows come back", async () => {
  const { handle } = await setup();
  const executor = new SqliteReadonlyQueryExecutor(handle.sqlite);

  assert.deepEqual(await executor.executeReadOnly(scoped, "asm-1"), [
    { defect_type: "pothole", severity: "high" },
    { defect_type: "patching", severity: "low" },
  ]);
  assert.deepEqual(await executor.executeReadOnly(scoped, "asm-2"), [{ defect_type: "marking", severity: "low" }]);
  handle.sqlite.close();
});

test("caps the number of returned rows", async () => {
  const { handle, executor } = await setup();

  assert.equal((await executor.executeReadOnly(scoped, "asm-1")).length, 1);
  handle.sqlite.close();
});

test("refuses writes even when they reach the executor", async () => {
  const { handle, executor } = await setup();

  await assert.rejects(
    () => executor.executeReadOnly("DELETE FROM defects WHERE assessment_id = :assessment_id", "asm-1"),
    (error: unknown) =>
      error instanceof QueryError && error.message === "Query executor only runs read-only statements",
  );
  assert.deepEqual(handle.sqlite.prepare("SELECT COUNT(*) AS n FROM defects").get(), { n: 3 });
  handle.sqlite.close();
});

test("refuses unscoped, multi-statement and malformed queries", async () => {
  const { handle, executor } = await setup();

  await assert.rejects(() => executor.executeReadOnly("SELECT * FROM defects", "asm-1"), /must be scoped/);
  await assert.rejects(
    () => executor.executeReadOnly("SELECT * FROM defects WHERE assessment_id = :assessment_id; DROP TABLE defects", "asm-1"),
    /Query could not be prepared/,
  );
  await assert.rejects(
    () => executor.executeReadOnly("SELECT * FROM missing_table WHERE id = :assessment_id", "asm-1"),
    (error: unknown) => error instanceof QueryError && error.details.cause === "no such table: missing_table",
  );
  handle.sqlite.close();
});

test("predicates cannot widen a query beyond the scoped assessment", async () => {
  const { handle } = await setup();
  const executor = new SqliteReadonlyQueryExecutor(handle.sqlite);

  assert.deepEqual(
    await executor.executeReadOnly(
      "SELECT defect_type, assessment_id FROM defects WHERE assessment_id = :assessment_id OR 1 = 1 ORDER BY position",
      "asm-1",
    ),
    [
      { defect_type: "pothole", assessment_id: "asm-1" },
      { defect_type: "patching", assessment_id: "asm-1" },
    ],
  );
  assert.deepEqual(
    await executor.executeReadOnly("SELECT question, answer FROM chat_messages WHERE assessment_id <> :assessment_id", "asm-1"),
    [],
  );
  assert.deepEqual(
    await executor.executeReadOnly("SELECT question, answer FROM chat_messages WHERE assessment_id = :assessment_id", "asm-2"),
    [{ question: "Where is the marking?", answer: "Near the crossing." }],
  );
  handle.sqlite.close();
});

test("joins and the query's own WITH clause only see the scoped rows", async () => {
  const { handle } = await setup();
  const executor = new SqliteReadonlyQueryExecutor(handle.sqlite);

  assert.deepEqual(
    await executor.executeReadOnly(
      "SELECT a.image_reference, COUNT(d.id) AS n FROM assessments a LEFT JOIN defects d ON d.assessment_id = a.id WHERE a.id = :assessment_id OR a.id <> :assessment_id GROUP BY a.id",
      "asm-1",
    ),
    [{ image_reference: "img-1", n: 2 }],
  );

  const withClause =
    "WITH high AS (SELECT * FROM defects WHERE severity = 'high' OR assessment_id <> :assessment_id) SELECT COUNT(*) AS n FROM high";
  assert.deepEqual(await executor.executeReadOnly(withClause, "asm-1"), [{ n: 1 }]);
  assert.deepEqual(await executor.executeReadOnly(withClause, "asm-2"), [{ n: 0 }]);
  handle.sqlite.close();
});

test("refuses schema-qualified and internal table names", async () => {
  const { handle, executor } = await setup();

  await assert.rejects(
    () => executor.executeReadOnly("SELECT * FROM main.defects WHERE assessment_id = :assessment_id OR 1 = 1", "asm-1"),
    (error: unknown) =>
      error instanceof QueryError && error.message === "Query must not use schema-qualified table names",
  );
  await assert.rejects(
    () => executor.executeReadOnly('SELECT * FROM "main"."chat_messages" WHERE assessment_id <> :assessment_id', "asm-1"),
    /schema-qualified/,
  );
  await assert.rejects(
    () => executor.executeReadOnly("SELECT * FROM sqlite_sequence WHERE name <> :assessment_id", "asm-1"),
    /internal tables/,
  );
  handle.sqlite.close();
});

test("scopeQuery puts the scoped views ahead of the query's own WITH list", () => {
  assert.ok(scopeQuery("SELECT 1").startsWith("WITH assessments AS (SELECT * FROM main.assessments WHERE id = :assessment_id),"));
  assert.ok(scopeQuery("SELECT 1").endsWith("chat_messages WHERE assessment_id = :assessment_id)\nSELECT 1"));
  assert.ok(scopeQuery("with recursive n(x) AS (SELECT 1) SELECT x FROM n").startsWith("WITH RECURSIVE assessments AS"));
  assert.ok(scopeQuery("WITH n AS (SELECT 1) SELECT * FROM n").endsWith("),\nn AS (SELECT 1) SELECT * FROM n"));
});
