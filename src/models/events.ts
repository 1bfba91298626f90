/**
 * Assessment events published to the event sink.
 */
import type { Classification } from './shared.js';
import type { GapSeverity } from './gap.js';

export const ASSESSMENT_TOPIC = 'assessment.events';

interface BaseEvent {
  timestamp: string;
  userId: string;
  assessmentId: string;
}

export interface AssessmentStartedEvent extends BaseEvent {
  eventType: 'assessment.started';
  domain: string;
  controlCount: number;
}

export interface ControlEvaluatedEvent extends BaseEvent {
  eventType: 'control.evaluated';
  controlId: string;
  controlTitle: string;
  classification: Classification;
  userResponse: string;
  explanation?: string;
  evidenceProvided: boolean;
}

export interface GapIdentifiedEvent extends BaseEvent {
  eventType: 'gap.identified';
  controlId: string;
  controlTitle: string;
  severity: GapSeverity;
  description: string;
  remediationPriority: number;
  estimatedEffort: string;
}

export interface AssessmentCompletedEvent extends BaseEvent {
  eventType: 'assessment.completed';
  domain: string;
  totalResponses: number;
}

export interface ReportGeneratedEvent extends BaseEvent {
  eventType: 'report.generated';
  domain: string;
  totalControls: number;
  compliantCount: number;
  partialCount: number;
  nonCompliantCount: number;
  complianceScore: number;
  gapCount: number;
  reportFormat: 'json' | 'markdown';
}

export type AssessmentEvent =
  | AssessmentStartedEvent
  | ControlEvaluatedEvent
  | GapIdentifiedEvent
  | AssessmentCompletedEvent
  | ReportGeneratedEvent;
