/**
 * Assessment service: the operations the HTTP layer exposes.
 *
 * Classifies answers (with fallback) before handing them to the session,
 * hands finished sessions to the repository and builds reports.
 */
import type { Control, ControlInfo } from '../models/control.js';
import { toControlInfo } from '../models/control.js';
import type {
  ClassificationResult,
  ClassifiedResponse,
  Progress,
  SessionState,
  SessionStatus,
  SubmitResult,
} from '../models/assessment.js';
import type { AssessmentReport } from '../models/report.js';
import { AssessmentNotFoundError, ControlMismatchError, InvalidStateError, errorMessage } from '../errors.js';
import { clock } from '../utils/clock.js';
import { isAssessmentId } from '../utils/id.js';
import { createLogger } from '../utils/logger.js';
import type { ControlCatalog } from './control-catalog.js';
import type { SessionActor } from './assessment-session.js';
import type { SessionRegistry } from './session-registry.js';
import type { AssessmentRepository } from './assessment-repository.js';
import type { EventPublisher } from './event-sink.js';
import {
  classifyWithFallback,
  questionWithFallback,
  type Classifier,
  type QuestionGenerator,
} from './classifier.js';
import { buildReport } from './report.js';
import { roundTo } from './scoring.js';

const log = createLogger('assessment');

export interface AssessmentServiceDeps {
  catalog: ControlCatalog;
  registry: SessionRegistry;
  classifier: Classifier;
  questions: QuestionGenerator;
  events: EventPublisher;
  repository: AssessmentRepository;
}

export interface StartAssessmentResult {
  assessmentId: string;
  domain: string;
  totalControls: number;
  firstControl: ControlInfo;
  firstQuestion: string;
}

export interface AnswerInput {
  userResponse: string;
  controlId?: string;
  evidenceProvided?: boolean;
}

export interface AnswerResult {
  status: 'in_progress' | 'completed';
  classification: ClassificationResult;
  progress: Progress;
  nextControl?: ControlInfo;
  nextQuestion?: string;
}

export interface AssessmentStatusView {
  assessmentId: string;
  domain: string | null;
  status: SessionStatus;
  startedAt: string | null;
  completedAt: string | null;
  progress: Progress;
  currentControl: ControlInfo | null;
}

type Resolved = { kind: 'live'; actor: SessionActor } | { kind: 'stored'; record: SessionState };

function progressOf(state: SessionState): Progress {
  const total = state.totalControls;
  return {
    completed: state.currentIndex,
    total,
    percentage: total > 0 ? roundTo((state.currentIndex / total) * 100, 2) : 0,
    status: state.status,
  };
}

export class AssessmentService {
  constructor(private readonly deps: AssessmentServiceDeps) {}

  async startAssessment(userId: string, domain: string): Promise<StartAssessmentResult> {
    const actor = this.deps.registry.create(userId);
    try {
      const started = await actor.ask({ type: 'start', domain });
      const control = await this.currentControlOf(actor);
      const firstQuestion = await questionWithFallback(this.deps.questions, control);
      return { ...started, firstQuestion };
    } catch (err: unknown) {
      this.deps.registry.remove(actor.assessmentId);
      throw err;
    }
  }

  async submitResponse(userId: string, assessmentId: string, input: AnswerInput): Promise<AnswerResult> {
    const actor = await this.liveActor(userId, assessmentId, 'submit a response');

    const progress = await actor.ask({ type: 'getProgress' });
    if (progress.status !== 'in_progress') {
      throw new InvalidStateError('submit a response', progress.status);
    }
    const control = await this.currentControlOf(actor);
    if (input.controlId !== undefined && input.controlId !== control.controlId) {
      throw new ControlMismatchError(control.controlId, input.controlId);
    }

    const classification = await classifyWithFallback(this.deps.classifier, control, input.userResponse);
    const result = await this.submitClassified(userId, assessmentId, {
      controlId: control.controlId,
      controlTitle: control.title,
      userResponse: input.userResponse,
      classification: classification.classification,
      explanation: classification.explanation,
      remediationNotes: classification.remediation,
      evidenceProvided: input.evidenceProvided ?? false,
      createdAt: clock.isoNow(),
    });

    if (result.status === 'completed') {
      return { status: result.status, classification, progress: result.progress };
    }

    const next = this.deps.catalog.getById(result.nextControl.controlId);
    return {
      status: result.status,
      classification,
      progress: result.progress,
      nextControl: result.nextControl,
      nextQuestion: next ? await questionWithFallback(this.deps.questions, next) : undefined,
    };
  }

  /** Record a response whose classification the caller already holds. */
  async submitClassified(userId: string, assessmentId: string, response: ClassifiedResponse): Promise<SubmitResult> {
    const actor = await this.liveActor(userId, assessmentId, 'submit a response');
    const result = await actor.ask({ type: 'submit', response });

    if (result.status === 'completed') {
      await this.store(actor);
    }
    return result;
  }

  async pause(userId: string, assessmentId: string): Promise<Progress> {
    const actor = await this.liveActor(userId, assessmentId, 'pause assessment');
    return actor.ask({ type: 'pause' });
  }

  async resume(userId: string, assessmentId: string): Promise<Progress> {
    const actor = await this.liveActor(userId, assessmentId, 'resume assessment');
    return actor.ask({ type: 'resume' });
  }

  async getStatus(userId: string, assessmentId: string): Promise<AssessmentStatusView> {
    const resolved = await this.resolve(userId, assessmentId);

    let state: SessionState;
    let current: Control | undefined;
    if (resolved.kind === 'live') {
      state = await resolved.actor.ask({ type: 'getState' });
      current = await resolved.actor.ask({ type: 'getCurrentControl' });
    } else {
      state = resolved.record;
    }

    return {
      assessmentId: state.assessmentId,
      domain: state.domain,
      status: state.status,
      startedAt: state.startedAt,
      completedAt: state.completedAt,
      progress: progressOf(state),
      currentControl: current ? toControlInfo(current) : null,
    };
  }

  async getReport(
    userId: string,
    assessmentId: string,
    format: 'json' | 'markdown' = 'json',
  ): Promise<AssessmentReport> {
    const resolved = await this.resolve(userId, assessmentId);
    const history = resolved.kind === 'live' ? await resolved.actor.ask({ type: 'getState' }) : resolved.record;
    const report = buildReport(history);

    void this.deps.events.publish({
      eventType: 'report.generated',
      timestamp: report.generatedAt,
      userId,
      assessmentId,
      domain: report.domain,
      totalControls: report.scoring.total,
      compliantCount: report.scoring.compliantCount,
      partialCount: report.scoring.partialCount,
      nonCompliantCount: report.scoring.nonCompliantCount,
      complianceScore: report.scoring.complianceScore,
      gapCount: report.gaps.length,
      reportFormat: format,
    });
    log.info(`Generated gap report for assessment ${assessmentId}`);
    return report;
  }

  async listAssessments(userId: string): Promise<SessionState[]> {
    return this.deps.repository.listByUser(userId);
  }

  private async resolve(userId: string, assessmentId: string): Promise<Resolved> {
    if (!isAssessmentId(assessmentId)) throw new AssessmentNotFoundError(assessmentId);
    const actor = this.deps.registry.get(assessmentId);
    if (actor) {
      if (actor.userId !== userId) throw new AssessmentNotFoundError(assessmentId);
      const { status } = await actor.ask({ type: 'getProgress' });
      const stored = status === 'completed' ? await this.store(actor) : undefined;
      return stored ? { kind: 'stored', record: stored } : { kind: 'live', actor };
    }
    const record = await this.deps.repository.findById(assessmentId);
    if (!record || record.userId !== userId) {
      throw new AssessmentNotFoundError(assessmentId);
    }
    return { kind: 'stored', record };
  }

  /**
   * Hand a completed session to the repository and retire its actor. On a save
   * failure the actor stays registered and the next lookup tries again.
   */
  private async store(actor: SessionActor): Promise<SessionState | undefined> {
    const state = await actor.ask({ type: 'getState' });
    try {
      await this.deps.repository.save(state);
    } catch (err: unknown) {
      log.error(`Failed to store assessment ${state.assessmentId}, keeping it live: ${errorMessage(err)}`);
      return undefined;
    }
    this.deps.registry.remove(state.assessmentId);
    log.info(`Assessment ${state.assessmentId} stored with ${state.responses.length} responses`);
    return state;
  }

  /** A finished assessment is only in the repository; mutating it is a state error. */
  private async liveActor(userId: string, assessmentId: string, operation: string): Promise<SessionActor> {
    const resolved = await this.resolve(userId, assessmentId);
    if (resolved.kind === 'stored') {
      throw new InvalidStateError(operation, resolved.record.status);
    }
    return resolved.actor;
  }

  private async currentControlOf(actor: SessionActor): Promise<Control> {
    const control = await actor.ask({ type: 'getCurrentControl' });
    if (!control) {
      const { status } = await actor.ask({ type: 'getProgress' });
      throw new InvalidStateError('read the current control', status);
    }
    return control;
  }
}
