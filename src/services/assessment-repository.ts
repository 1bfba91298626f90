/**
 * Durable storage boundary for finished assessments.
 */
import type { SessionState } from '../models/assessment.js';

export interface AssessmentRepository {
  save(state: SessionState): Promise<void>;
  findById(assessmentId: string): Promise<SessionState | undefined>;
  listByUser(userId: string): Promise<SessionState[]>;
}

export class InMemoryAssessmentRepository implements AssessmentRepository {
  private readonly records = new Map<string, SessionState>();

  async save(state: SessionState): Promise<void> {
    this.records.set(state.assessmentId, structuredClone(state));
  }

  async findById(assessmentId: string): Promise<SessionState | undefined> {
    const record = this.records.get(assessmentId);
    return record ? structuredClone(record) : undefined;
  }

  async listByUser(userId: string): Promise<SessionState[]> {
    return Array.from(this.records.values())
      .filter((r) => r.userId === userId)
      .map((r) => structuredClone(r));
  }
}
