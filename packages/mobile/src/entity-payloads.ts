/**
 * Wire payloads for the domain records the app hands to the sync service.
 *
 * @module entity-payloads
 */

import type { JsonObject, JsonValue, SyncPriority } from '@kinesync/core';

/**
 * A completed or in-progress exercise session.
 */
export interface SessionRecord {
  id: string;
  startedAt: Date;
  completedAt?: Date;
  durationSeconds?: number;
  overallScore?: number;
  notes?: string;
}

/**
 * The analysed outcome of one exercise inside a session.
 */
export interface ExerciseResultRecord {
  id: string;
  sessionId: string;
  exerciseId: string;
  exerciseName: string;
  setsCompleted: number;
  repsCompleted: number;
  score?: number;
  isCorrect?: boolean;
  /** Structured form feedback from the movement analysis */
  feedback?: JsonValue;
  textReport?: string;
  durationSeconds?: number;
  performedAt: Date;
}

export const SESSION_PRIORITY: SyncPriority = 'normal';
export const EXERCISE_RESULT_PRIORITY: SyncPriority = 'high';

export function sessionToPayload(session: SessionRecord): JsonObject {
  return {
    id: session.id,
    started_at: session.startedAt.toISOString(),
    completed_at: session.completedAt?.toISOString() ?? null,
    duration_seconds: session.durationSeconds ?? null,
    overall_score: session.overallScore ?? null,
    notes: session.notes ?? null,
  };
}

export function exerciseResultToPayload(result: ExerciseResultRecord): JsonObject {
  return {
    id: result.id,
    session_id: result.sessionId,
    exercise_id: result.exerciseId,
    exercise_name: result.exerciseName,
    sets_completed: result.setsCompleted,
    reps_completed: result.repsCompleted,
    score: result.score ?? null,
    is_correct: result.isCorrect ?? null,
    feedback: result.feedback ?? null,
    text_report: result.textReport ?? null,
    duration_seconds: result.durationSeconds ?? null,
    performed_at: result.performedAt.toISOString(),
  };
}
