/**
 * Beast Tests: Scoring Engine
 */
import { describe, it, expect } from 'vitest';
import {
  complianceSummary,
  improvementNeeded,
  normalizeClassification,
  score,
  scoreBreakdown,
  trafficLight,
} from '../../src/services/scoring.js';
import type { Classification } from '../../src/models/shared.js';
import { classified } from './helpers.js';

function responses(compliant: number, partial: number, nonCompliant: number) {
  const all: Array<{ classification: Classification }> = [];
  for (let i = 0; i < compliant; i++) all.push({ classification: 'compliant' });
  for (let i = 0; i < partial; i++) all.push({ classification: 'partial' });
  for (let i = 0; i < nonCompliant; i++) all.push({ classification: 'non_compliant' });
  return all;
}

describe('Beast 2: Scoring Engine', () => {
  it('Beast 2.1 — should score 6 compliant, 3 partial, 1 non-compliant as 75% yellow', () => {
    expect(score(responses(6, 3, 1))).toEqual({
      total: 10,
      compliantCount: 6,
      partialCount: 3,
      nonCompliantCount: 1,
      complianceScore: 0.75,
      compliancePercentage: 75,
      trafficLight: 'yellow',
    });
  });

  it('Beast 2.2 — should score an empty response list as 0 and red', () => {
    expect(score([])).toEqual({
      total: 0,
      compliantCount: 0,
      partialCount: 0,
      nonCompliantCount: 0,
      complianceScore: 0,
      compliancePercentage: 0,
      trafficLight: 'red',
    });
  });

  it('Beast 2.3 — should treat the thresholds as closed lower bounds', () => {
    expect(trafficLight(0.8)).toBe('green');
    expect(trafficLight(0.7999)).toBe('yellow');
    expect(trafficLight(0.5)).toBe('yellow');
    expect(trafficLight(0.4999)).toBe('red');
    expect(trafficLight(1)).toBe('green');
    expect(trafficLight(0)).toBe('red');
  });

  it('Beast 2.4 — should reach green at exactly 0.8', () => {
    const result = score(responses(4, 0, 1));

    expect(result.complianceScore).toBe(0.8);
    expect(result.trafficLight).toBe('green');
  });

  it('Beast 2.5 — should round the score to 4 decimals and the percentage to 2', () => {
    const third = score(responses(1, 0, 2));
    const twoThirds = score(responses(2, 0, 1));

    expect(third.complianceScore).toBe(0.3333);
    expect(third.compliancePercentage).toBe(33.33);
    expect(third.trafficLight).toBe('red');
    expect(twoThirds.complianceScore).toBe(0.6667);
    expect(twoThirds.compliancePercentage).toBe(66.67);
    expect(twoThirds.trafficLight).toBe('yellow');
  });

  it('Beast 2.6 — should not depend on response order', () => {
    const forward = responses(2, 3, 2);
    const reversed = [...forward].reverse();

    expect(score(reversed)).toEqual(score(forward));
  });

  it('Beast 2.7 — should keep counts summing to the total', () => {
    const result = score(responses(3, 4, 5));

    expect(result.compliantCount + result.partialCount + result.nonCompliantCount).toBe(result.total);
    expect(result.complianceScore).toBe(0.4167);
  });

  it('Beast 2.8 — should normalise classifier spellings', () => {
    expect(normalizeClassification(' Non-Compliant ')).toBe('non_compliant');
    expect(normalizeClassification('FAIL')).toBe('non_compliant');
    expect(normalizeClassification('pass')).toBe('compliant');
    expect(normalizeClassification('partially_compliant')).toBe('partial');
    expect(normalizeClassification('maybe')).toBe('partial');
  });

  it('Beast 2.9 — should write a one-line compliance summary', () => {
    expect(complianceSummary(score(responses(6, 3, 1)))).toBe(
      'Overall compliance: 75.0% (YELLOW). 6 compliant, 3 partially compliant, 1 non-compliant out of 10 controls.',
    );
  });

  it('Beast 2.10 — should group control ids by classification', () => {
    const breakdown = scoreBreakdown([
      classified('AC-1', 'compliant'),
      classified('AC-2', 'non_compliant'),
      classified('AC-3', 'compliant'),
      classified('AC-4', 'partial'),
    ]);

    expect(breakdown).toEqual({
      compliant: ['AC-1', 'AC-3'],
      partial: ['AC-4'],
      non_compliant: ['AC-2'],
    });
  });

  it('Beast 2.11 — should report the gap to the target score', () => {
    expect(improvementNeeded(0.75)).toEqual({
      targetReached: false,
      currentScore: 0.75,
      targetScore: 0.8,
      scoreGap: 0.05,
      percentageGap: 5,
      recommendation: 'Improve 5% of controls to reach target',
    });
    expect(improvementNeeded(0.85)).toEqual({
      targetReached: true,
      currentScore: 0.85,
      targetScore: 0.8,
      scoreGap: 0,
      percentageGap: 0,
    });
  });
});
