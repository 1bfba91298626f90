/**
 * Scoring: Service
 *
 * Weighted compliance score: compliant = 1.0, partial = 0.5, non_compliant = 0.0,
 * divided by the number of responses. Only the counts matter, never the order.
 *
 *   green  score >= 0.8
 *   yellow 0.5 <= score < 0.8
 *   red    score < 0.5
 */
import type { Classification } from '../models/shared.js';
import type { ClassifiedResponse } from '../models/assessment.js';
import type {
  ImprovementAnalysis,
  ScoreBreakdown,
  ScoringResult,
  TrafficLight,
} from '../models/scoring.js';

const WEIGHTS: Record<Classification, number> = {
  compliant: 1.0,
  partial: 0.5,
  non_compliant: 0.0,
};

export const GREEN_THRESHOLD = 0.8;
export const YELLOW_THRESHOLD = 0.5;

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

export function trafficLight(score: number): TrafficLight {
  if (score >= GREEN_THRESHOLD) return 'green';
  if (score >= YELLOW_THRESHOLD) return 'yellow';
  return 'red';
}

export function countClassifications(
  responses: readonly Pick<ClassifiedResponse, 'classification'>[],
): Record<Classification, number> {
  const counts: Record<Classification, number> = { compliant: 0, partial: 0, non_compliant: 0 };
  for (const r of responses) {
    counts[r.classification] += 1;
  }
  return counts;
}

export function score(responses: readonly Pick<ClassifiedResponse, 'classification'>[]): ScoringResult {
  const counts = countClassifications(responses);
  const total = responses.length;

  const weighted =
    counts.compliant * WEIGHTS.compliant +
    counts.partial * WEIGHTS.partial +
    counts.non_compliant * WEIGHTS.non_compliant;
  const complianceScore = total > 0 ? roundTo(weighted / total, 4) : 0;

  return {
    total,
    compliantCount: counts.compliant,
    partialCount: counts.partial,
    nonCompliantCount: counts.non_compliant,
    complianceScore,
    compliancePercentage: roundTo(complianceScore * 100, 2),
    trafficLight: trafficLight(complianceScore),
  };
}

const CLASSIFICATION_ALIASES: Record<string, Classification> = {
  compliant: 'compliant',
  complete: 'compliant',
  pass: 'compliant',
  partial: 'partial',
  partially_compliant: 'partial',
  partial_compliance: 'partial',
  non_compliant: 'non_compliant',
  'non-compliant': 'non_compliant',
  noncompliant: 'non_compliant',
  fail: 'non_compliant',
  not_compliant: 'non_compliant',
};

export function lookupClassification(raw: string): Classification | undefined {
  return CLASSIFICATION_ALIASES[raw.trim().toLowerCase()];
}

/** Map the spellings an LLM tends to produce onto a Classification; unknown → partial. */
export function normalizeClassification(raw: string): Classification {
  return lookupClassification(raw) ?? 'partial';
}

export function complianceSummary(result: ScoringResult): string {
  return (
    `Overall compliance: ${result.compliancePercentage.toFixed(1)}% (${result.trafficLight.toUpperCase()}). ` +
    `${result.compliantCount} compliant, ` +
    `${result.partialCount} partially compliant, ` +
    `${result.nonCompliantCount} non-compliant ` +
    `out of ${result.total} controls.`
  );
}

export function scoreBreakdown(
  responses: readonly Pick<ClassifiedResponse, 'classification' | 'controlId'>[],
): ScoreBreakdown {
  const breakdown: ScoreBreakdown = { compliant: [], partial: [], non_compliant: [] };
  for (const r of responses) {
    breakdown[r.classification].push(r.controlId);
  }
  return breakdown;
}

export function improvementNeeded(currentScore: number, targetScore = GREEN_THRESHOLD): ImprovementAnalysis {
  if (currentScore >= targetScore) {
    return {
      targetReached: true,
      currentScore,
      targetScore,
      scoreGap: 0,
      percentageGap: 0,
    };
  }

  const gap = targetScore - currentScore;
  return {
    targetReached: false,
    currentScore,
    targetScore,
    scoreGap: roundTo(gap, 4),
    percentageGap: roundTo(gap * 100, 2),
    recommendation: `Improve ${roundTo(gap * 100, 1)}% of controls to reach target`,
  };
}
