import { CONDITION_RATINGS, DEFECT_TYPES, SEVERITIES, type StageError } from "@pavewise/contracts";
import { index, integer, real, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const assessments = sqliteTable(
  "assessments",
  {
    id: text("id").primaryKey(),
    imageReference: text("image_reference").notNull(),
    location: text("location"),
    conditionScore: integer("condition_score").notNull(),
    conditionRating: text("condition_rating", { enum: CONDITION_RATINGS }).notNull(),
    analysisText: text("analysis_text").notNull(),
    analysisSource: text("analysis_source", { enum: ["model", "rule_based"] }).notNull(),
    recommendations: text("recommendations", { mode: "json" }).$type<string[]>().notNull(),
    stageErrors: text("stage_errors", { mode: "json" }).$type<StageError[]>().notNull(),
    createdAt: text("created_at").notNull(),
  },
  (table) => ({
    createdAtIdx: index("assessments_created_at_idx").on(table.createdAt),
  }),
);

export const defects = sqliteTable(
  "defects",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    assessmentId: text("assessment_id")
      .notNull()
      .references(() => assessments.id, { onDelete: "cascade" }),
    position: integer("position").notNull(),
    defectType: text("defect_type", { enum: DEFECT_TYPES }).notNull(),
    severity: text("severity", { enum: SEVERITIES }).notNull(),
    extent: real("extent").notNull(),
    confidence: real("confidence").notNull(),
    bboxX: integer("bbox_x"),
    bboxY: integer("bbox_y"),
    bboxWidth: integer("bbox_width"),
    bboxHeight: integer("bbox_height"),
  },
  (table) => ({
    assessmentIdx: index("defects_assessment_id_idx").on(table.assessmentId),
  }),
);

export const chatMessages = sqliteTable(
  "chat_messages",
  {
    id: text("id").primaryKey(),
    assessmentId: text("assessment_id")
      .notNull()
      .references(() => assessments.id, { onDelete: "cascade" }),
    question: text("question").notNull(),
    generatedQuery: text("generated_query"),
    answer: text("answer").notNull(),
    createdAt: text("created_at").notNull(),
  },
  (table) => ({
    assessmentIdx: index("chat_messages_assessment_id_idx").on(table.assessmentId, table.createdAt),
  }),
);

export type AssessmentRow = typeof assessments.$inferSelect;
export type DefectRow = typeof defects.$inferSelect;
export type NewDefectRow = typeof defects.$inferInsert;
export type ChatMessageRow = typeof chatMessages.$inferSelect;
