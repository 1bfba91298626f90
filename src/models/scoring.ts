/**
 * Scoring: Types
 */
import type { Classification } from './shared.js';

export type TrafficLight = 'green' | 'yellow' | 'red';

export interface ScoringResult {
  total: number;
  compliantCount: number;
  partialCount: number;
  nonCompliantCount: number;
  /** 0.0–1.0, four decimals. */
  complianceScore: number;
  /** 0–100, two decimals. */
  compliancePercentage: number;
  trafficLight: TrafficLight;
}

export type ScoreBreakdown = Record<Classification, string[]>;

export interface ImprovementAnalysis {
  targetReached: boolean;
  currentScore: number;
  targetScore: number;
  scoreGap: number;
  percentageGap: number;
  recommendation?: string;
}
