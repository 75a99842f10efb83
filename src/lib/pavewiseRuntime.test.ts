import assert from "node:assert/strict";
import test, { mock } from "node:test";

import { ConfigurationError } from "../../engine/ai/errors";
import { createPavewiseRuntime } from "./pavewiseRuntime";
import { getProviderEnvConfig } from "./providerConfig";

mock.method(console, "info", () => undefined);
mock.method(console, "warn", () => undefined);

const detector = {
  detect: async () => [
    { label: "apothole", confidence: 0.88, bbox: { x: 5, y: 5, width: 60, height: 60 }, areaPixels: 9500 },
  ],
};

test("wires the pipelines end to end against an in-memory store", async () => {
  const replies = ["Single large pothole.", "One pothole needs repair."];
  const runtime = createPavewiseRuntime(getProviderEnvConfig({ PAVEWISE_DATABASE_PATH: ":memory:" }), {
    detector,
    languageModel: { generate: async () => replies.shift() ?? "" },
  });

  const submitted = await runtime.submitAssessment({ imageReference: "img-9" });
  assert.equal(submitted.status, "completed");
  assert.ok(submitted.assessment);

  const answer = await runtime.askAboutAssessment({
    assessmentId: submitted.assessment.id,
    question: "Is it safe to drive?",
  });
  assert.equal(answer.status, "answered");
  assert.equal(answer.answer, "One pothole needs repair.");

  const history = await runtime.listChatHistory(submitted.assessment.id);
  assert.equal(history.length, 1);
  runtime.close();
});

test("requires the model endpoint when no language model is supplied", () => {
  assert.throws(
    () => createPavewiseRuntime(getProviderEnvConfig({ PAVEWISE_DATABASE_PATH: ":memory:" }), { detector }),
    (error: unknown) =>
      error instanceof ConfigurationError && error.message.includes("Missing required environment variable OLLAMA_BASE_URL"),
  );
});
