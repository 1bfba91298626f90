/**
 * Gap analysis: Service
 *
 * Turns partial and non-compliant responses into prioritised gaps, a bucketed
 * remediation plan and a list of recommendations.
 */
import type { Classification } from '../models/shared.js';
import type { ClassifiedResponse } from '../models/assessment.js';
import type {
  GapCost,
  GapEffort,
  GapItem,
  GapSeverity,
  RemediationAction,
  RemediationPlan,
} from '../models/gap.js';

export type GapClassification = Exclude<Classification, 'compliant'>;

export interface GapRule {
  severity: GapSeverity;
  priority: number;
  effort: GapEffort;
  cost: GapCost;
}

/** The one priority table used everywhere gaps are derived. */
export const GAP_RULES: Readonly<Record<GapClassification, Readonly<GapRule>>> = Object.freeze({
  non_compliant: Object.freeze({ severity: 'high', priority: 8, effort: 'High', cost: '>$20K' }),
  partial: Object.freeze({ severity: 'medium', priority: 5, effort: 'Medium', cost: '$5-20K' }),
});

export const DEFAULT_REMEDIATION_STEP = 'Review control requirements and implement missing components';
export const DEFAULT_GAP_DESCRIPTION = 'Implementation gap identified';

export const IMMEDIATE_PRIORITY = 7;
export const SHORT_TERM_PRIORITY = 4;

const COST_ESTIMATE: Record<GapCost, number> = {
  '>$20K': 25000,
  '$5-20K': 12500,
  '<$5K': 2500,
};

const EFFORT_WEEKS: Record<GapEffort, number> = {
  High: 8,
  Medium: 4,
  Low: 1,
};

export function isGapClassification(classification: Classification): classification is GapClassification {
  return classification !== 'compliant';
}

/** Split remediation notes on newlines, bullets and dashes. */
export function parseRemediationSteps(notes: string | undefined): string[] {
  const steps = (notes ?? '')
    .split(/[\n•-]/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return steps.length > 0 ? steps : [DEFAULT_REMEDIATION_STEP];
}

export function gapFromResponse(
  response: ClassifiedResponse & { classification: GapClassification },
): GapItem {
  const rule = GAP_RULES[response.classification];
  return {
    controlId: response.controlId,
    controlTitle: response.controlTitle,
    severity: rule.severity,
    currentStatus: response.classification,
    gapDescription: response.explanation || DEFAULT_GAP_DESCRIPTION,
    remediationSteps: parseRemediationSteps(response.remediationNotes),
    estimatedEffort: rule.effort,
    estimatedCost: rule.cost,
    priority: rule.priority,
  };
}

/** Highest priority first; equal priorities keep their input order. */
export function prioritizeGaps(gaps: readonly GapItem[]): GapItem[] {
  return [...gaps].sort((a, b) => b.priority - a.priority);
}

export function identifyGaps(responses: readonly ClassifiedResponse[]): GapItem[] {
  const gaps: GapItem[] = [];
  for (const response of responses) {
    const { classification } = response;
    if (isGapClassification(classification)) {
      gaps.push(gapFromResponse({ ...response, classification }));
    }
  }
  return prioritizeGaps(gaps);
}

function toAction(gap: GapItem): RemediationAction {
  return {
    controlId: gap.controlId,
    controlTitle: gap.controlTitle,
    priority: gap.priority,
    steps: [...gap.remediationSteps],
    effort: gap.estimatedEffort,
    cost: gap.estimatedCost,
  };
}

export function formatUsd(amount: number): string {
  return `$${amount.toLocaleString('en-US')}`;
}

export function remediationPlan(gaps: readonly GapItem[]): RemediationPlan {
  const immediate = gaps.filter((g) => g.priority >= IMMEDIATE_PRIORITY);
  const shortTerm = gaps.filter((g) => g.priority >= SHORT_TERM_PRIORITY && g.priority < IMMEDIATE_PRIORITY);
  const longTerm = gaps.filter((g) => g.priority < SHORT_TERM_PRIORITY);

  const totalCost = gaps.reduce((sum, g) => sum + COST_ESTIMATE[g.estimatedCost], 0);
  const totalWeeks = gaps.reduce((sum, g) => sum + EFFORT_WEEKS[g.estimatedEffort], 0);

  return {
    immediate: immediate.map(toAction),
    shortTerm: shortTerm.map(toAction),
    longTerm: longTerm.map(toAction),
    summary: {
      totalGaps: gaps.length,
      highPriority: immediate.length,
      mediumPriority: shortTerm.length,
      lowPriority: longTerm.length,
      estimatedTotalCost: totalCost,
      estimatedTotalCostLabel: formatUsd(totalCost),
      estimatedTimelineWeeks: totalWeeks,
      estimatedTimelineMonths: Math.round((totalWeeks / 4) * 10) / 10,
    },
  };
}

const GENERAL_RECOMMENDATIONS = [
  'Assign dedicated resources to compliance remediation efforts',
  'Establish regular compliance review cadence (monthly recommended)',
  'Document all remediation activities with evidence for audit trail',
  'Consider engaging a registered practitioner for independent guidance',
];

export function generateRecommendations(gaps: readonly GapItem[]): string[] {
  if (gaps.length === 0) return [];

  const high = gaps.filter((g) => g.severity === 'high').length;
  const medium = gaps.filter((g) => g.severity === 'medium').length;
  const low = gaps.filter((g) => g.severity === 'low').length;

  const recommendations: string[] = [];
  if (high > 0) {
    recommendations.push(`CRITICAL: Address ${high} high-severity gaps immediately to reach compliance`);
  }
  if (medium > 0) {
    recommendations.push(`Enhance ${medium} partially compliant controls to full compliance`);
  }
  if (low > 0) {
    recommendations.push(`Plan remediation for ${low} low-priority gaps in next compliance cycle`);
  }

  recommendations.push(...GENERAL_RECOMMENDATIONS);

  if (high >= 5 || gaps.length >= 10) {
    recommendations.push('Recommend comprehensive compliance program overhaul with executive sponsorship');
  }
  return recommendations;
}
