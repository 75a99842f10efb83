import type { Assessment } from "@pavewise/contracts";

import { QueryError } from "../ai/errors";
import type { ConversationTurn, LanguageModel } from "../ai/languageModel";
import {
  END,
  WorkflowEngine,
  createWorkflowState,
  type WorkflowGraph,
  type WorkflowRunOptions,
  type WorkflowState,
} from "../ai/workflowEngine";
import {
  defectStatistics,
  estimatedCost,
  formatUsd,
  priorityList,
  suggestedTimeline,
} from "../scoring/derivedMetrics";
import { getPavementTables, type PavementTables } from "../scoring/tables";
import { SCOPE_PARAMETER, assertReadOnlyQuery, extractQuery } from "./queryGuard";

export type QueryRow = Record<string, unknown>;

export type ExecuteOptions = {
  signal?: AbortSignal;
};

/** Runs a validated read-only statement with the scope parameter bound. */
export interface QueryExecutor {
  executeReadOnly(query: string, scopeId: string, options?: ExecuteOptions): Promise<QueryRow[]>;
}

export type ChatInput = {
  question: string;
  assessment: Assessment;
  history: ReadonlyArray<ConversationTurn>;
};

export type ChatResults = {
  ClassifyIntent: { needsQuery: boolean };
  GenerateQuery: { query: string | null };
  ValidateQuery: { query: string };
  Execute: { rows: QueryRow[] };
  ComposeAnswer: { answer: string };
};

export type ChatState = WorkflowState<ChatInput, ChatResults>;

export type ChatPipelineDeps = {
  languageModel: LanguageModel;
  queryExecutor: QueryExecutor;
  stageTimeoutMs?: number;
  maxRows?: number;
};

const QUERY_INTENT_KEYWORDS = [
  "show",
  "list",
  "find",
  "get",
  "count",
  "how many",
  "all",
  "total",
  "average",
  "sum",
  "maximum",
  "minimum",
  "where",
  "filter",
  "search",
  "query",
  "select",
];

const intentPattern = new RegExp(`\\b(${QUERY_INTENT_KEYWORDS.join("|")})\\b`, "i");

export const needsStructuredQuery = (question: string): boolean => intentPattern.test(question);

export const QUERY_SCHEMA_DESCRIPTION = `SQLite schema:

assessments(id TEXT PRIMARY KEY, image_reference TEXT, location TEXT NULL,
  condition_score INTEGER, condition_rating TEXT, analysis_text TEXT,
  analysis_source TEXT, created_at TEXT)

defects(id INTEGER PRIMARY KEY, assessment_id TEXT REFERENCES assessments(id),
  position INTEGER, defect_type TEXT, severity TEXT, extent REAL, confidence REAL,
  bbox_x INTEGER, bbox_y INTEGER, bbox_width INTEGER, bbox_height INTEGER)

defect_type is one of pothole, spalling, patching, marking.
severity is one of low, medium, high.

Examples:
  SELECT defect_type, COUNT(*) AS count FROM defects WHERE assessment_id = ${SCOPE_PARAMETER} GROUP BY defect_type
  SELECT * FROM defects WHERE assessment_id = ${SCOPE_PARAMETER} AND severity = 'high'`;

const QUERY_SYSTEM_PROMPT = [
  "You translate questions about one pavement assessment into a single SQLite SELECT statement.",
  `Always filter on the parameter ${SCOPE_PARAMETER}.`,
  "Return only the SQL, with no explanation. Never write INSERT, UPDATE, DELETE or DDL.",
].join(" ");

const ANSWER_SYSTEM_PROMPT = [
  "You are a pavement engineer answering questions about a stored condition assessment.",
  "Use only the assessment data and query results provided. Say so when the data does not answer the question.",
].join(" ");

export function createChatGraph(deps: ChatPipelineDeps): WorkflowGraph<ChatInput, ChatResults> {
  const maxRows = deps.maxRows ?? 50;

  return {
    name: "chat",
    stages: {
      ClassifyIntent: {
        policy: "continue",
        run: async (state) => ({ needsQuery: needsStructuredQuery(state.input.question) }),
      },
      GenerateQuery: {
        policy: "continue",
        timeoutMs: deps.stageTimeoutMs,
        run: async (state, { signal }) => {
          const reply = await deps.languageModel.generate(
            `${QUERY_SCHEMA_DESCRIPTION}\n\nQuestion: ${state.input.question}`,
            { system: QUERY_SYSTEM_PROMPT },
            { signal },
          );
          const query = extractQuery(reply);
          return { query: query.length > 0 ? query : null };
        },
      },
      ValidateQuery: {
        policy: "fatal",
        run: async (state) => ({ query: assertReadOnlyQuery(state.results.GenerateQuery?.query ?? "") }),
      },
      Execute: {
        policy: "continue",
        timeoutMs: deps.stageTimeoutMs,
        run: async (state, { signal }) => {
          const query = state.results.ValidateQuery?.query;
          if (!query) {
            throw new QueryError("No validated query to execute");
          }
          const rows = await deps.queryExecutor.executeReadOnly(query, state.input.assessment.id, { signal });
          return { rows: rows.slice(0, maxRows) };
        },
      },
      ComposeAnswer: {
        policy: "continue",
        timeoutMs: deps.stageTimeoutMs,
        run: async (state, { signal }) => {
          const { assessment } = state.input;
          const answer = await deps.languageModel.generate(
            state.input.question,
            {
              system: ANSWER_SYSTEM_PROMPT,
              history: state.input.history,
              data: {
                conditionScore: assessment.conditionScore,
                location: assessment.location,
                detections: assessment.detections,
                recommendations: assessment.recommendations,
                query: state.results.ValidateQuery?.query ?? null,
                // An executor failure is answered as an empty result set.
                queryResult: state.results.ValidateQuery ? (state.results.Execute?.rows ?? []) : null,
              },
            },
            { signal },
          );
          return { answer };
        },
      },
    },
    edges: {
      ClassifyIntent: (state) => (state.results.ClassifyIntent?.needsQuery ? "GenerateQuery" : "ComposeAnswer"),
      GenerateQuery: (state) => (state.results.GenerateQuery?.query ? "ValidateQuery" : "ComposeAnswer"),
      ValidateQuery: "Execute",
      Execute: "ComposeAnswer",
      ComposeAnswer: END,
    },
  };
}

export async function runChatPipeline(
  engine: WorkflowEngine,
  graph: WorkflowGraph<ChatInput, ChatResults>,
  input: ChatInput,
  options: WorkflowRunOptions = {},
): Promise<ChatState> {
  return engine.run(graph, "ClassifyIntent", createWorkflowState<ChatInput, ChatResults>(input), options);
}

const mentions = (question: string, words: ReadonlyArray<string>): boolean =>
  words.some((word) => question.includes(word));

/** Deterministic answer built from the derived metrics, chosen by question keywords. */
export function buildToolBasedAnswer(
  question: string,
  assessment: Assessment,
  tables: Readonly<PavementTables> = getPavementTables(),
): string {
  const normalized = question.toLowerCase();
  const { detections, conditionScore } = assessment;

  if (mentions(normalized, ["cost", "price", "budget", "expense"])) {
    const cost = estimatedCost(detections, tables);
    const lines = [
      `Estimated repair cost: ${formatUsd(cost.expected)} (range ${formatUsd(cost.low)} - ${formatUsd(cost.high)})`,
    ];
    for (const [defectType, amount] of Object.entries(cost.byType)) {
      if (amount > 0) {
        lines.push(`- ${defectType}: ${formatUsd(amount)}`);
      }
    }
    return lines.join("\n");
  }

  if (mentions(normalized, ["priority", "urgent", "critical", "first"])) {
    const items = priorityList(detections, tables);
    if (items.length === 0) {
      return "No repairs needed: no defects were detected.";
    }
    return [
      "Priority repairs:",
      ...items.map(
        (item) =>
          `${item.rank}. ${item.defectType} (${item.severity} severity, extent ${item.extent}, confidence ${item.confidence.toFixed(2)})`,
      ),
    ].join("\n");
  }

  if (mentions(normalized, ["when", "timeline", "schedule", "time"])) {
    const timeline = suggestedTimeline(conditionScore, tables);
    return `${timeline.summary} for a ${conditionScore.rating} rating (score ${conditionScore.score}).`;
  }

  if (mentions(normalized, ["statistics", "stats", "summary", "overview"])) {
    const stats = defectStatistics(detections);
    const byType = Object.entries(stats.byType).filter(([, count]) => count > 0);
    const bySeverity = Object.entries(stats.bySeverity).filter(([, count]) => count > 0);
    return [
      `Total defects: ${stats.total}`,
      `By type: ${byType.map(([name, count]) => `${name} ${count}`).join(", ") || "none"}`,
      `By severity: ${bySeverity.map(([name, count]) => `${name} ${count}`).join(", ") || "none"}`,
    ].join("\n");
  }

  const summary = `Condition score ${conditionScore.score} (${conditionScore.rating}) with ${detections.length} detected defect(s).`;
  return assessment.recommendations.length > 0
    ? `${summary} Recommendations: ${assessment.recommendations.join("; ")}`
    : summary;
}
