import { randomUUID } from "crypto";

import type { Assessment, ChatMessage, Detection, NewAssessment } from "@pavewise/contracts";
import { asc, desc, eq, sql } from "drizzle-orm";

import { RecordStoreError } from "../../engine/ai/errors";
import type { PavewiseDatabase } from "./db/client";
import { assessments, chatMessages, defects, type AssessmentRow, type DefectRow, type NewDefectRow } from "./db/schema";

export type NewChatMessage = Omit<ChatMessage, "id" | "createdAt">;

export interface AssessmentRepository {
  createAssessment(input: NewAssessment): Promise<Assessment>;
  getAssessment(id: string): Promise<Assessment | null>;
  appendChatMessage(input: NewChatMessage): Promise<ChatMessage>;
  /** Most recent `limit` messages, oldest first. */
  listChatMessages(assessmentId: string, limit?: number): Promise<ChatMessage[]>;
}

export type SqliteAssessmentRepositoryOptions = {
  now?: () => Date;
  generateId?: () => string;
};

function toDefectRow(assessmentId: string, detection: Detection, position: number): NewDefectRow {
  return {
    assessmentId,
    position,
    defectType: detection.defectType,
    severity: detection.severity,
    extent: detection.extent,
    confidence: detection.confidence,
    bboxX: detection.bbox?.x ?? null,
    bboxY: detection.bbox?.y ?? null,
    bboxWidth: detection.bbox?.width ?? null,
    bboxHeight: detection.bbox?.height ?? null,
  };
}

function fromDefectRow(row: DefectRow): Detection {
  const { bboxX, bboxY, bboxWidth, bboxHeight } = row;
  return {
    defectType: row.defectType,
    severity: row.severity,
    extent: row.extent,
    confidence: row.confidence,
    ...(bboxX !== null && bboxY !== null && bboxWidth !== null && bboxHeight !== null
      ? { bbox: { x: bboxX, y: bboxY, width: bboxWidth, height: bboxHeight } }
      : {}),
  };
}

function fromAssessmentRow(row: AssessmentRow, detections: Detection[]): Assessment {
  return {
    id: row.id,
    imageReference: row.imageReference,
    location: row.location,
    detections,
    conditionScore: { score: row.conditionScore, rating: row.conditionRating },
    analysisText: row.analysisText,
    analysisSource: row.analysisSource,
    recommendations: row.recommendations,
    stageErrors: row.stageErrors,
    createdAt: row.createdAt,
  };
}

export class SqliteAssessmentRepository implements AssessmentRepository {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly db: PavewiseDatabase,
    options: SqliteAssessmentRepositoryOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async createAssessment(input: NewAssessment): Promise<Assessment> {
    const assessment: Assessment = {
      ...input,
      id: this.generateId(),
      createdAt: this.now().toISOString(),
    };

    // Assessment and defects commit together; readers never see a partial record.
    try {
      this.db.transaction((tx) => {
        tx.insert(assessments)
          .values({
            id: assessment.id,
            imageReference: assessment.imageReference,
            location: assessment.location,
            conditionScore: assessment.conditionScore.score,
            conditionRating: assessment.conditionScore.rating,
            analysisText: assessment.analysisText,
            analysisSource: assessment.analysisSource,
            recommendations: assessment.recommendations,
            stageErrors: assessment.stageErrors,
            createdAt: assessment.createdAt,
          })
          .run();

        if (assessment.detections.length > 0) {
          tx.insert(defects)
            .values(assessment.detections.map((detection, position) => toDefectRow(assessment.id, detection, position)))
            .run();
        }
      });
    } catch (error) {
      throw new RecordStoreError(`Unable to store assessment for ${assessment.imageReference}`, error);
    }

    return assessment;
  }

  async getAssessment(id: string): Promise<Assessment | null> {
    try {
      const row = this.db.select().from(assessments).where(eq(assessments.id, id)).get();
      if (!row) {
        return null;
      }

      const defectRows = this.db
        .select()
        .from(defects)
        .where(eq(defects.assessmentId, id))
        .orderBy(asc(defects.position))
        .all();
      return fromAssessmentRow(row, defectRows.map(fromDefectRow));
    } catch (error) {
      throw new RecordStoreError(`Unable to load assessment ${id}`, error);
    }
  }

  async appendChatMessage(input: NewChatMessage): Promise<ChatMessage> {
    const message: ChatMessage = {
      ...input,
      id: this.generateId(),
      createdAt: this.now().toISOString(),
    };

    try {
      this.db.insert(chatMessages).values(message).run();
    } catch (error) {
      throw new RecordStoreError(`Unable to store chat message for assessment ${input.assessmentId}`, error);
    }

    return message;
  }

  async listChatMessages(assessmentId: string, limit = 10): Promise<ChatMessage[]> {
    try {
      const rows = this.db
        .select()
        .from(chatMessages)
        .where(eq(chatMessages.assessmentId, assessmentId))
        .orderBy(desc(chatMessages.createdAt), desc(sql`rowid`))
        .limit(limit)
        .all();
      return rows.reverse();
    } catch (error) {
      throw new RecordStoreError(`Unable to load chat history for assessment ${assessmentId}`, error);
    }
  }
}
