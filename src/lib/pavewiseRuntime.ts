import type { ChatMessage, ChatResponse, SubmitAssessmentResponse } from "@pavewise/contracts";

import { OllamaLanguageModel, type LanguageModel } from "../../engine/ai/languageModel";
import { OllamaClient } from "../../engine/ai/ollamaClient";
import { WorkflowEngine, type WorkflowRunOptions } from "../../engine/ai/workflowEngine";
import { getPavementTables } from "../../engine/scoring/tables";
import { createAssessmentGraph } from "../../engine/workflows/assessmentPipeline";
import { createChatGraph, type QueryExecutor } from "../../engine/workflows/chatPipeline";
import type { Detector } from "../../engine/workflows/detections";
import { SqliteAssessmentRepository, type AssessmentRepository } from "./assessmentPersistence";
import { submitAssessment } from "./assessmentService";
import { askAboutAssessment, listChatHistory } from "./chatService";
import { openDatabase, openReadonlyConnection } from "./db/client";
import { HttpDetector } from "./detectorClient";
import { getProviderEnvConfig, requireSetting, type ProviderEnvConfig } from "./providerConfig";
import { SqliteReadonlyQueryExecutor } from "./readonlyQueryExecutor";
import { logWorkflowEvent } from "./workflowLogging";

export type PavewiseRuntime = {
  submitAssessment(request: unknown, options?: WorkflowRunOptions): Promise<SubmitAssessmentResponse>;
  askAboutAssessment(request: unknown, options?: WorkflowRunOptions): Promise<ChatResponse>;
  listChatHistory(assessmentId: string): Promise<ChatMessage[]>;
  close(): void;
};

export type RuntimeOverrides = {
  detector?: Detector;
  languageModel?: LanguageModel;
  repository?: AssessmentRepository;
  queryExecutor?: QueryExecutor;
};

/**
 * Wires collaborators from environment configuration. Overrides replace the
 * HTTP and SQLite collaborators, so the HTTP variables are only required for
 * the collaborators that are not overridden.
 */
export function createPavewiseRuntime(
  config: ProviderEnvConfig = getProviderEnvConfig(),
  overrides: RuntimeOverrides = {},
): PavewiseRuntime {
  const tables = getPavementTables();

  const detector =
    overrides.detector ??
    new HttpDetector({
      baseUrl: requireSetting(config, "detectorBaseUrl", "DETECTOR_BASE_URL"),
      timeoutMs: config.stageTimeoutMs,
    });

  const languageModel =
    overrides.languageModel ??
    new OllamaLanguageModel({
      model: config.ollamaChatModel,
      client: new OllamaClient({
        baseUrl: requireSetting(config, "ollamaBaseUrl", "OLLAMA_BASE_URL"),
        timeoutMs: config.stageTimeoutMs,
        onCircuitOpen: (state) => console.error("ollama_circuit_open", state),
      }),
    });

  const needsDatabase = !overrides.repository || !overrides.queryExecutor;
  const handle = needsDatabase ? openDatabase(config.databasePath) : null;
  const readonlySqlite = handle && !overrides.queryExecutor ? openReadonlyConnection(handle) : null;

  const repository = overrides.repository ?? (handle ? new SqliteAssessmentRepository(handle.db) : null);
  const queryExecutor =
    overrides.queryExecutor ?? (readonlySqlite ? new SqliteReadonlyQueryExecutor(readonlySqlite) : null);
  if (!repository || !queryExecutor) {
    throw new Error("Record store collaborators could not be created");
  }

  const engine = new WorkflowEngine({
    maxSteps: config.workflowMaxSteps,
    defaultTimeoutMs: config.stageTimeoutMs,
    onEvent: logWorkflowEvent,
  });
  const assessmentGraph = createAssessmentGraph({
    detector,
    languageModel,
    tables,
    confidenceThreshold: config.detectorConfidenceThreshold,
    stageTimeoutMs: config.stageTimeoutMs,
  });
  const chatGraph = createChatGraph({ languageModel, queryExecutor, stageTimeoutMs: config.stageTimeoutMs });

  return {
    submitAssessment: (request, options) =>
      submitAssessment(request, { engine, graph: assessmentGraph, repository, tables }, options),
    askAboutAssessment: (request, options) =>
      askAboutAssessment(request, { engine, graph: chatGraph, repository, tables }, options),
    listChatHistory: (assessmentId) => listChatHistory(assessmentId, { repository }),
    close: () => {
      if (readonlySqlite && readonlySqlite !== handle?.sqlite) {
        readonlySqlite.close();
      }
      handle?.sqlite.close();
    },
  };
}
