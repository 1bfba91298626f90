/**
 * Gap analysis: Types
 */
import type { Classification } from './shared.js';

export type GapSeverity = 'high' | 'medium' | 'low';
export type GapEffort = 'High' | 'Medium' | 'Low';
export type GapCost = '>$20K' | '$5-20K' | '<$5K';

export interface GapItem {
  controlId: string;
  controlTitle: string;
  severity: GapSeverity;
  currentStatus: Exclude<Classification, 'compliant'>;
  gapDescription: string;
  remediationSteps: string[];
  estimatedEffort: GapEffort;
  estimatedCost: GapCost;
  /** 1–10, higher is more urgent. */
  priority: number;
}

export interface RemediationAction {
  controlId: string;
  controlTitle: string;
  priority: number;
  steps: string[];
  effort: GapEffort;
  cost: GapCost;
}

export interface RemediationSummary {
  totalGaps: number;
  highPriority: number;
  mediumPriority: number;
  lowPriority: number;
  estimatedTotalCost: number;
  estimatedTotalCostLabel: string;
  estimatedTimelineWeeks: number;
  estimatedTimelineMonths: number;
}

export interface RemediationPlan {
  immediate: RemediationAction[];
  shortTerm: RemediationAction[];
  longTerm: RemediationAction[];
  summary: RemediationSummary;
}
