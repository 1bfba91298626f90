/**
 * Assessment report: Types
 */
import type { Classification } from './shared.js';
import type { ImprovementAnalysis, ScoreBreakdown, ScoringResult } from './scoring.js';
import type { GapItem, RemediationPlan } from './gap.js';

export interface ControlResponseSummary {
  controlId: string;
  controlTitle: string;
  classification: Classification;
  userResponse: string;
  explanation: string;
  remediation?: string;
  evidenceProvided: boolean;
}

export interface AssessmentReport {
  assessmentId: string;
  domain: string;
  generatedAt: string;
  scoring: ScoringResult;
  breakdown: ScoreBreakdown;
  improvement: ImprovementAnalysis;
  executiveSummary: string;
  controlResponses: ControlResponseSummary[];
  gaps: GapItem[];
  remediationPlan: RemediationPlan;
  recommendations: string[];
}
