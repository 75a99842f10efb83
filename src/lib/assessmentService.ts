import {
  SubmitAssessmentRequestSchema,
  type SubmitAssessmentResponse,
} from "@pavewise/contracts";

import { ValidationError } from "../../engine/ai/errors";
import {
  collectStageErrors,
  type WorkflowEngine,
  type WorkflowGraph,
  type WorkflowRunOptions,
} from "../../engine/ai/workflowEngine";
import { getPavementTables, type PavementTables } from "../../engine/scoring/tables";
import {
  buildRuleBasedAnalysis,
  runAssessmentPipeline,
  type AssessmentInput,
  type AssessmentResults,
} from "../../engine/workflows/assessmentPipeline";
import type { AssessmentRepository } from "./assessmentPersistence";

export type AssessmentServiceDeps = {
  engine: WorkflowEngine;
  graph: WorkflowGraph<AssessmentInput, AssessmentResults>;
  repository: AssessmentRepository;
  tables?: Readonly<PavementTables>;
};

export async function submitAssessment(
  request: unknown,
  deps: AssessmentServiceDeps,
  options: WorkflowRunOptions = {},
): Promise<SubmitAssessmentResponse> {
  const parsed = SubmitAssessmentRequestSchema.safeParse(request);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
    throw new ValidationError("Invalid assessment request", { subject: "request", issues });
  }

  const input: AssessmentInput = {
    imageReference: parsed.data.imageReference,
    location: parsed.data.location ?? null,
  };
  const state = await runAssessmentPipeline(deps.engine, deps.graph, input, options);
  const detections = state.results.Detect;
  const score = state.results.Score;

  if (state.fatal || !detections || !score) {
    console.warn("assessment_failed", {
      imageReference: input.imageReference,
      cancelled: state.cancelled,
      stageErrors: collectStageErrors(state.log),
    });
    return { status: "failed", assessment: null, stageLog: state.log };
  }

  const analysis = state.results.Analyze;
  const analyzeFailure = state.log.find((entry) => entry.stage === "Analyze" && entry.status === "failed");
  const assessment = await deps.repository.createAssessment({
    imageReference: input.imageReference,
    location: input.location,
    detections,
    conditionScore: score.conditionScore,
    analysisText:
      analysis?.text ??
      buildRuleBasedAnalysis(detections, score.conditionScore, deps.tables ?? getPavementTables(), analyzeFailure?.message),
    analysisSource: analysis ? "model" : "rule_based",
    recommendations: score.recommendations,
    stageErrors: collectStageErrors(state.log),
  });

  console.info("assessment_completed", {
    assessmentId: assessment.id,
    score: assessment.conditionScore.score,
    rating: assessment.conditionScore.rating,
    defects: detections.length,
    degraded: state.degraded,
  });

  return {
    status: state.degraded ? "partial" : "completed",
    assessment,
    stageLog: state.log,
  };
}
