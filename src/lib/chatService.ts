import { ChatRequestSchema, type ChatMessage, type ChatResponse } from "@pavewise/contracts";

import { ValidationError, WorkflowCancelledError } from "../../engine/ai/errors";
import type { WorkflowEngine, WorkflowGraph, WorkflowRunOptions } from "../../engine/ai/workflowEngine";
import { getPavementTables, type PavementTables } from "../../engine/scoring/tables";
import {
  buildToolBasedAnswer,
  runChatPipeline,
  type ChatInput,
  type ChatResults,
} from "../../engine/workflows/chatPipeline";
import type { AssessmentRepository } from "./assessmentPersistence";

export type ChatServiceDeps = {
  engine: WorkflowEngine;
  graph: WorkflowGraph<ChatInput, ChatResults>;
  repository: AssessmentRepository;
  tables?: Readonly<PavementTables>;
  historyLimit?: number;
};

export const SAFETY_GATE_REFUSAL =
  "I can't answer that with a database query: the generated query was rejected by the read-only safety gate. " +
  "Only single SELECT statements scoped to this assessment are allowed.";

export async function askAboutAssessment(
  request: unknown,
  deps: ChatServiceDeps,
  options: WorkflowRunOptions = {},
): Promise<ChatResponse> {
  const parsed = ChatRequestSchema.safeParse(request);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
    throw new ValidationError("Invalid chat request", { subject: "request", issues });
  }

  const { assessmentId, question } = parsed.data;
  const assessment = await deps.repository.getAssessment(assessmentId);
  if (!assessment) {
    return {
      status: "not_found",
      answer: `Assessment ${assessmentId} was not found.`,
      generatedQuery: null,
      stageLog: [],
    };
  }

  const history = await deps.repository.listChatMessages(assessmentId, deps.historyLimit ?? 10);
  const state = await runChatPipeline(
    deps.engine,
    deps.graph,
    { question, assessment, history: history.map(({ question: asked, answer }) => ({ question: asked, answer })) },
    options,
  );

  if (state.cancelled) {
    throw new WorkflowCancelledError({ stage: state.log[state.log.length - 1]?.stage ?? "ClassifyIntent" });
  }

  const generatedQuery = state.results.ValidateQuery?.query ?? state.results.GenerateQuery?.query ?? null;
  if (state.fatal) {
    console.warn("chat_query_refused", {
      assessmentId,
      generatedQuery,
      reason: state.log.find((entry) => entry.status === "failed")?.message,
    });
    return { status: "refused", answer: SAFETY_GATE_REFUSAL, generatedQuery, stageLog: state.log };
  }

  const answer =
    state.results.ComposeAnswer?.answer ?? buildToolBasedAnswer(question, assessment, deps.tables ?? getPavementTables());
  await deps.repository.appendChatMessage({ assessmentId, question, generatedQuery, answer });

  console.info("chat_answered", {
    assessmentId,
    usedQuery: generatedQuery !== null,
    fallback: state.results.ComposeAnswer === undefined,
  });

  return { status: "answered", answer, generatedQuery, stageLog: state.log };
}

export async function listChatHistory(
  assessmentId: string,
  deps: Pick<ChatServiceDeps, "repository">,
  limit = 50,
): Promise<ChatMessage[]> {
  return deps.repository.listChatMessages(assessmentId, limit);
}
