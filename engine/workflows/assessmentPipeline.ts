import type { ConditionScore, Detection } from "@pavewise/contracts";

import { DetectionError } from "../ai/errors";
import type { LanguageModel } from "../ai/languageModel";
import { createMetricsToolRegistry, type ToolRegistry } from "../ai/tools";
import {
  END,
  WorkflowEngine,
  createWorkflowState,
  type WorkflowGraph,
  type WorkflowRunOptions,
  type WorkflowState,
} from "../ai/workflowEngine";
import { buildRecommendations, defectStatistics, priorityList, suggestedTimeline } from "../scoring/derivedMetrics";
import { scoreDetections, type ScoreResult } from "../scoring/scoreEngine";
import { getPavementTables, type PavementTables } from "../scoring/tables";
import { normalizeDetections, type Detector } from "./detections";

export type AssessmentInput = {
  imageReference: string;
  location: string | null;
};

export type ScoreStageOutput = ScoreResult & {
  recommendations: string[];
};

export type AnalyzeStageOutput = {
  text: string;
  toolResults: Record<string, unknown>;
};

export type AssessmentResults = {
  Detect: Detection[];
  Score: ScoreStageOutput;
  Analyze: AnalyzeStageOutput;
};

export type AssessmentState = WorkflowState<AssessmentInput, AssessmentResults>;

export type AssessmentPipelineDeps = {
  detector: Detector;
  languageModel: LanguageModel;
  tools?: ToolRegistry;
  tables?: Readonly<PavementTables>;
  confidenceThreshold?: number;
  stageTimeoutMs?: number;
};

const ANALYSIS_SYSTEM_PROMPT = [
  "You are a pavement engineer writing a condition assessment.",
  "Cite only the numbers given in the context; do not invent measurements or costs.",
].join(" ");

const analysisPrompt = (input: AssessmentInput): string =>
  [
    "Write a concise pavement condition assessment for the inspected section.",
    `Image: ${input.imageReference}`,
    `Location: ${input.location ?? "not provided"}`,
    "Cover overall condition, the most severe defects, recommended repairs with their urgency, and the cost range.",
  ].join("\n");

export function createAssessmentGraph(
  deps: AssessmentPipelineDeps,
): WorkflowGraph<AssessmentInput, AssessmentResults> {
  const tables = deps.tables ?? getPavementTables();
  const tools = deps.tools ?? createMetricsToolRegistry();

  return {
    name: "assessment",
    stages: {
      Detect: {
        policy: "fatal",
        timeoutMs: deps.stageTimeoutMs,
        run: async (state, { signal }) => {
          const raw = await deps.detector
            .detect(state.input.imageReference, { signal })
            .catch((error: unknown) => {
              throw error instanceof DetectionError
                ? error
                : new DetectionError(`Detector failed for ${state.input.imageReference}`, error);
            });
          return normalizeDetections(raw, tables, { confidenceThreshold: deps.confidenceThreshold });
        },
      },
      Score: {
        policy: "fatal",
        run: async (state) => {
          const detections = state.results.Detect ?? [];
          const result = scoreDetections(detections, tables);
          return {
            ...result,
            recommendations: buildRecommendations(detections, result.conditionScore, tables),
          };
        },
      },
      Analyze: {
        policy: "continue",
        timeoutMs: deps.stageTimeoutMs,
        run: async (state, { signal }) => {
          const detections = state.results.Detect ?? [];
          const score = state.results.Score;
          if (!score) {
            throw new Error("Analyze requires a condition score");
          }

          const toolResults = await tools.invokeAll({ detections, conditionScore: score.conditionScore, tables });
          const text = await deps.languageModel.generate(
            analysisPrompt(state.input),
            {
              system: ANALYSIS_SYSTEM_PROMPT,
              data: { conditionScore: score.conditionScore, detections, metrics: toolResults },
            },
            { signal },
          );
          return { text, toolResults };
        },
      },
    },
    edges: {
      Detect: "Score",
      Score: "Analyze",
      Analyze: END,
    },
  };
}

export async function runAssessmentPipeline(
  engine: WorkflowEngine,
  graph: WorkflowGraph<AssessmentInput, AssessmentResults>,
  input: AssessmentInput,
  options: WorkflowRunOptions = {},
): Promise<AssessmentState> {
  return engine.run(graph, "Detect", createWorkflowState<AssessmentInput, AssessmentResults>(input), options);
}

/** Narrative used when the language model could not produce one. */
export function buildRuleBasedAnalysis(
  detections: ReadonlyArray<Detection>,
  conditionScore: ConditionScore,
  tables: Readonly<PavementTables> = getPavementTables(),
  failureMessage?: string,
): string {
  const stats = defectStatistics(detections);
  const timeline = suggestedTimeline(conditionScore, tables);
  const lines = [
    "Pavement Assessment Report",
    `Overall condition: score ${conditionScore.score}/100 (${conditionScore.rating})`,
    `Defects detected: ${stats.total}`,
  ];

  const top = priorityList(detections, tables).filter((item) => item.severity === "high").slice(0, 3);
  if (top.length > 0) {
    lines.push(`High-severity defects: ${top.map((item) => `${item.defectType} (extent ${item.extent})`).join(", ")}`);
  }

  lines.push(`Recommended action: ${timeline.summary}`);
  if (failureMessage) {
    lines.push(`Generated without the language model: ${failureMessage}`);
  }

  return lines.join("\n");
}
