/**
 * Report assembly: Service
 *
 * Builds the final assessment report from a completed session and renders it
 * as Markdown or JSON. Every piece of text comes from fixed templates, so the
 * same history always yields the same report apart from `generatedAt`.
 */
import type { SessionState } from '../models/assessment.js';
import type { AssessmentReport, ControlResponseSummary } from '../models/report.js';
import type { ScoringResult, TrafficLight } from '../models/scoring.js';
import type { GapItem } from '../models/gap.js';
import type { Classification } from '../models/shared.js';
import { EmptyHistoryError, NotCompletedError } from '../errors.js';
import { clock } from '../utils/clock.js';
import {
  GREEN_THRESHOLD,
  YELLOW_THRESHOLD,
  complianceSummary,
  improvementNeeded,
  score,
  scoreBreakdown,
} from './scoring.js';
import {
  IMMEDIATE_PRIORITY,
  SHORT_TERM_PRIORITY,
  generateRecommendations,
  identifyGaps,
  remediationPlan,
} from './gap-analysis.js';

const STATUS_TEXT: Record<TrafficLight, string> = {
  green: 'COMPLIANT - Meets the assessed control requirements',
  yellow: 'NEEDS IMPROVEMENT - Partial compliance achieved',
  red: 'NON-COMPLIANT - Significant gaps identified',
};

const STATUS_MARK: Record<Classification, string> = {
  compliant: '✓',
  partial: '⚠',
  non_compliant: '✗',
};

function share(count: number, total: number): string {
  return total > 0 ? ((count / total) * 100).toFixed(1) : '0.0';
}

export function keyFindings(scoring: ScoringResult): string[] {
  const findings: string[] = [];

  if (scoring.total > 0 && scoring.compliantCount === scoring.total) {
    findings.push('✓ All controls are fully compliant - excellent security posture');
  } else if (scoring.complianceScore >= GREEN_THRESHOLD) {
    findings.push('✓ Strong overall compliance with minor gaps to address');
  } else if (scoring.complianceScore >= YELLOW_THRESHOLD) {
    findings.push('⚠ Moderate compliance level with several areas requiring improvement');
  } else {
    findings.push('✗ Significant compliance gaps requiring comprehensive remediation');
  }

  if (scoring.compliantCount > 0) {
    findings.push(`✓ ${scoring.compliantCount} controls demonstrate strong implementation`);
  }
  if (scoring.nonCompliantCount > 0) {
    findings.push(`✗ ${scoring.nonCompliantCount} controls have critical gaps requiring immediate remediation`);
  }
  return findings;
}

export function nextSteps(scoring: ScoringResult): string[] {
  const steps: Array<[string, string]> = [];

  if (scoring.nonCompliantCount > 0) {
    steps.push(['IMMEDIATE', `Address ${scoring.nonCompliantCount} non-compliant controls`]);
  }
  if (scoring.partialCount > 0) {
    steps.push(['SHORT-TERM', `Enhance ${scoring.partialCount} partially compliant controls`]);
  }
  if (scoring.complianceScore < GREEN_THRESHOLD) {
    steps.push(['ONGOING', 'Implement continuous compliance monitoring']);
    steps.push(['STRATEGIC', 'Develop comprehensive compliance program with executive support']);
  } else {
    steps.push(['MAINTAIN', 'Continue current compliance practices']);
    steps.push(['MONITOR', 'Regular compliance reviews (quarterly recommended)']);
  }
  steps.push(['VALIDATION', 'Consider engaging an independent assessor for validation']);

  return steps.map(([label, text], i) => `${i + 1}. **${label}**: ${text}`);
}

export function executiveSummary(domain: string, scoring: ScoringResult): string {
  const lines = [
    `# Executive Summary - ${domain} Domain Assessment`,
    '',
    '## Overall Compliance Status',
    `**${STATUS_TEXT[scoring.trafficLight]}**`,
    '',
    `Overall compliance score: **${scoring.compliancePercentage.toFixed(1)}%** (${scoring.trafficLight.toUpperCase()})`,
    '',
    '## Assessment Results',
    `- **Total Controls Assessed**: ${scoring.total}`,
    `- **Compliant**: ${scoring.compliantCount} (${share(scoring.compliantCount, scoring.total)}%)`,
    `- **Partially Compliant**: ${scoring.partialCount} (${share(scoring.partialCount, scoring.total)}%)`,
    `- **Non-Compliant**: ${scoring.nonCompliantCount} (${share(scoring.nonCompliantCount, scoring.total)}%)`,
    '',
    '## Key Findings',
    ...keyFindings(scoring).map((f) => `- ${f}`),
    '',
    '## Compliance Gap Summary',
    `- **High Priority Gaps**: ${scoring.nonCompliantCount} controls require immediate attention`,
    `- **Medium Priority Gaps**: ${scoring.partialCount} controls need enhancement`,
    '',
    '## Recommended Next Steps',
    ...nextSteps(scoring),
  ];
  return lines.join('\n');
}

export function buildReport(history: SessionState): AssessmentReport {
  if (history.status !== 'completed') {
    throw new NotCompletedError(history.assessmentId);
  }
  if (history.responses.length === 0) {
    throw new EmptyHistoryError(history.assessmentId);
  }

  const domain = history.domain ?? 'Unknown';
  const scoring = score(history.responses);
  const gaps = identifyGaps(history.responses);

  const controlResponses: ControlResponseSummary[] = history.responses.map((r) => ({
    controlId: r.controlId,
    controlTitle: r.controlTitle,
    classification: r.classification,
    userResponse: r.userResponse,
    explanation: r.explanation ?? '',
    remediation: r.remediationNotes,
    evidenceProvided: r.evidenceProvided,
  }));

  return {
    assessmentId: history.assessmentId,
    domain,
    generatedAt: clock.isoNow(),
    scoring,
    breakdown: scoreBreakdown(history.responses),
    improvement: improvementNeeded(scoring.complianceScore),
    executiveSummary: executiveSummary(domain, scoring),
    controlResponses,
    gaps,
    remediationPlan: remediationPlan(gaps),
    recommendations: generateRecommendations(gaps),
  };
}

function highPriorityGapLines(gap: GapItem): string[] {
  return [
    `#### ${gap.controlId}: ${gap.controlTitle}`,
    `- **Severity**: ${gap.severity.toUpperCase()}`,
    `- **Current Status**: ${gap.currentStatus}`,
    `- **Priority**: ${gap.priority}/10`,
    `- **Gap Description**: ${gap.gapDescription}`,
    `- **Estimated Effort**: ${gap.estimatedEffort}`,
    `- **Estimated Cost**: ${gap.estimatedCost}`,
    '',
    '**Remediation Steps**:',
    ...gap.remediationSteps.map((step) => `- ${step}`),
    '',
  ];
}

function gapSection(gaps: readonly GapItem[]): string[] {
  if (gaps.length === 0) {
    return ['*No gaps identified.*', ''];
  }

  const high = gaps.filter((g) => g.priority >= IMMEDIATE_PRIORITY);
  const medium = gaps.filter((g) => g.priority >= SHORT_TERM_PRIORITY && g.priority < IMMEDIATE_PRIORITY);
  const low = gaps.filter((g) => g.priority < SHORT_TERM_PRIORITY);

  const lines = ['### High Priority Gaps', ''];
  if (high.length > 0) {
    for (const gap of high) lines.push(...highPriorityGapLines(gap));
  } else {
    lines.push('*No high priority gaps identified.*', '');
  }

  lines.push('### Medium Priority Gaps', '');
  if (medium.length > 0) {
    for (const gap of medium) lines.push(`- **${gap.controlId}**: ${gap.controlTitle} - ${gap.gapDescription}`);
    lines.push('');
  } else {
    lines.push('*No medium priority gaps identified.*', '');
  }

  if (low.length > 0) {
    lines.push('### Low Priority Gaps', '');
    for (const gap of low) lines.push(`- **${gap.controlId}**: ${gap.controlTitle} - ${gap.gapDescription}`);
    lines.push('');
  }
  return lines;
}

export function toMarkdown(report: AssessmentReport): string {
  const { scoring, remediationPlan: plan } = report;

  const lines = [
    '# Control Gap Assessment Report',
    `**Domain**: ${report.domain}`,
    `**Assessment ID**: ${report.assessmentId}`,
    `**Generated**: ${report.generatedAt}`,
    '',
    '---',
    '',
    report.executiveSummary,
    '',
    '---',
    '',
    '## Detailed Scoring Results',
    '',
    '| Metric | Value |',
    '|--------|-------|',
    `| Total Controls | ${scoring.total} |`,
    `| Compliant | ${scoring.compliantCount} |`,
    `| Partially Compliant | ${scoring.partialCount} |`,
    `| Non-Compliant | ${scoring.nonCompliantCount} |`,
    `| Compliance Score | ${scoring.compliancePercentage.toFixed(1)}% |`,
    `| Status | ${scoring.trafficLight.toUpperCase()} |`,
    '',
    complianceSummary(scoring),
    ...(report.improvement.recommendation
      ? ['', `**Improvement needed**: ${report.improvement.recommendation}`]
      : []),
    '',
    '---',
    '',
    `## Identified Gaps (${report.gaps.length})`,
    '',
    ...gapSection(report.gaps),
    '---',
    '',
    '## Remediation Plan',
    '',
    `- **Immediate Actions**: ${plan.summary.highPriority}`,
    `- **Short-Term Actions**: ${plan.summary.mediumPriority}`,
    `- **Long-Term Actions**: ${plan.summary.lowPriority}`,
    `- **Estimated Cost**: ${plan.summary.estimatedTotalCostLabel}`,
    `- **Estimated Timeline**: ${plan.summary.estimatedTimelineWeeks} weeks (${plan.summary.estimatedTimelineMonths} months)`,
    '',
    '---',
    '',
    '## Recommendations',
    '',
    ...report.recommendations.map((rec, i) => `${i + 1}. ${rec}`),
    '',
    '---',
    '',
    '## Control-by-Control Assessment',
    '',
  ];

  for (const response of report.controlResponses) {
    lines.push(`### ${STATUS_MARK[response.classification]} ${response.controlId}: ${response.controlTitle}`);
    lines.push(`**Status**: ${response.classification.toUpperCase()}`);
    lines.push(`**Assessment**: ${response.explanation}`);
    if (response.remediation) {
      lines.push(`**Remediation**: ${response.remediation}`);
    }
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}

export function toJSON(report: AssessmentReport): string {
  return JSON.stringify(report, null, 2);
}
