/**
 * Assessment sessions: Types
 */
import type { Classification } from './shared.js';
import type { ControlInfo } from './control.js';

export type SessionStatus = 'initialized' | 'in_progress' | 'paused' | 'completed';

export interface ClassifiedResponse {
  controlId: string;
  controlTitle: string;
  userResponse: string;
  classification: Classification;
  explanation?: string;
  /** Newline- or bullet-delimited remediation steps. */
  remediationNotes?: string;
  evidenceProvided: boolean;
  createdAt: string;
}

export interface SessionState {
  userId: string;
  assessmentId: string;
  domain: string | null;
  status: SessionStatus;
  currentIndex: number;
  totalControls: number;
  responses: ClassifiedResponse[];
  startedAt: string | null;
  completedAt: string | null;
}

export interface Progress {
  completed: number;
  total: number;
  percentage: number;
  status: SessionStatus;
}

export interface StartResult {
  assessmentId: string;
  domain: string;
  totalControls: number;
  firstControl: ControlInfo;
}

export type SubmitResult =
  | { status: 'in_progress'; progress: Progress; nextControl: ControlInfo }
  | { status: 'completed'; progress: Progress; totalResponses: number };

/** Output of the LLM classifier for one answer. */
export interface ClassificationResult {
  classification: Classification;
  explanation: string;
  remediation?: string;
  confidence: number;
}
