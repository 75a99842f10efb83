import { z } from "zod";

export const DEFECT_TYPES = ["pothole", "spalling", "patching", "marking"] as const;
export const SEVERITIES = ["low", "medium", "high"] as const;

// Worst to best; index order is the rating rank.
export const CONDITION_RATINGS = [
  "Failed",
  "Very Poor",
  "Poor",
  "Fair",
  "Satisfactory",
  "Good",
  "Very Good",
  "Excellent",
] as const;

export const DefectTypeSchema = z.enum(DEFECT_TYPES);
export const SeveritySchema = z.enum(SEVERITIES);
export const ConditionRatingSchema = z.enum(CONDITION_RATINGS);

export const BoundingBoxSchema = z.object({
  x: z.number().int().nonnegative(),
  y: z.number().int().nonnegative(),
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
});

export const DetectionSchema = z.object({
  defectType: DefectTypeSchema,
  severity: SeveritySchema,
  extent: z.number().finite().nonnegative(),
  confidence: z.number().min(0).max(1),
  bbox: BoundingBoxSchema.optional(),
});

export const RawDetectionSchema = z.object({
  label: z.string().min(1),
  confidence: z.number(),
  bbox: BoundingBoxSchema,
  areaPixels: z.number().nonnegative(),
});

export const DetectorResponseSchema = z.object({
  detections: z.array(RawDetectionSchema),
  modelId: z.string().optional(),
});

export const ConditionScoreSchema = z.object({
  score: z.number().int().min(0).max(100),
  rating: ConditionRatingSchema,
});

export const StageStatusSchema = z.enum(["running", "succeeded", "failed"]);

export const StageLogEntrySchema = z.object({
  stage: z.string().min(1),
  status: StageStatusSchema,
  startedAt: z.number(),
  finishedAt: z.number().optional(),
  errorName: z.string().optional(),
  message: z.string().optional(),
});

export const StageErrorSchema = z.object({
  stage: z.string().min(1),
  message: z.string(),
});

export const AnalysisSourceSchema = z.enum(["model", "rule_based"]);

export const AssessmentSchema = z.object({
  id: z.string().min(1),
  imageReference: z.string().min(1),
  location: z.string().nullable(),
  detections: z.array(DetectionSchema),
  conditionScore: ConditionScoreSchema,
  analysisText: z.string(),
  analysisSource: AnalysisSourceSchema,
  recommendations: z.array(z.string()),
  stageErrors: z.array(StageErrorSchema),
  createdAt: z.string().datetime(),
});

export const NewAssessmentSchema = AssessmentSchema.omit({ id: true, createdAt: true });

export const ChatMessageSchema = z.object({
  id: z.string().min(1),
  assessmentId: z.string().min(1),
  question: z.string().min(1),
  generatedQuery: z.string().nullable(),
  answer: z.string(),
  createdAt: z.string().datetime(),
});

export const SubmitAssessmentRequestSchema = z.object({
  imageReference: z.string().min(1),
  location: z.string().min(1).optional(),
});

export const SubmitAssessmentResponseSchema = z.object({
  status: z.enum(["completed", "partial", "failed"]),
  assessment: AssessmentSchema.nullable(),
  stageLog: z.array(StageLogEntrySchema),
});

export const ChatRequestSchema = z.object({
  assessmentId: z.string().min(1),
  question: z.string().trim().min(1).max(2000),
});

export const ChatResponseSchema = z.object({
  status: z.enum(["answered", "refused", "not_found"]),
  answer: z.string(),
  generatedQuery: z.string().nullable(),
  stageLog: z.array(StageLogEntrySchema),
});

export type DefectType = z.infer<typeof DefectTypeSchema>;
export type Severity = z.infer<typeof SeveritySchema>;
export type ConditionRating = z.infer<typeof ConditionRatingSchema>;
export type BoundingBox = z.infer<typeof BoundingBoxSchema>;
export type Detection = z.infer<typeof DetectionSchema>;
export type RawDetection = z.infer<typeof RawDetectionSchema>;
export type DetectorResponse = z.infer<typeof DetectorResponseSchema>;
export type ConditionScore = z.infer<typeof ConditionScoreSchema>;
export type StageStatus = z.infer<typeof StageStatusSchema>;
export type StageLogEntry = z.infer<typeof StageLogEntrySchema>;
export type StageError = z.infer<typeof StageErrorSchema>;
export type AnalysisSource = z.infer<typeof AnalysisSourceSchema>;
export type Assessment = z.infer<typeof AssessmentSchema>;
export type NewAssessment = z.infer<typeof NewAssessmentSchema>;
export type ChatMessage = z.infer<typeof ChatMessageSchema>;
export type SubmitAssessmentRequest = z.infer<typeof SubmitAssessmentRequestSchema>;
export type SubmitAssessmentResponse = z.infer<typeof SubmitAssessmentResponseSchema>;
export type ChatRequest = z.infer<typeof ChatRequestSchema>;
export type ChatResponse = z.infer<typeof ChatResponseSchema>;
