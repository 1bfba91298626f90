/**
 * Assessment sessions: state machine and mailbox
 *
 *   initialized → in_progress ⇄ paused
 *                 in_progress → completed (after the last control)
 *
 * AssessmentSession holds the state and is synchronous. SessionActor owns one
 * session and runs the commands sent to it one at a time, in arrival order.
 */
import type { Control } from '../models/control.js';
import type { AssessmentEvent } from '../models/events.js';
import { toControlInfo } from '../models/control.js';
import type {
  ClassifiedResponse,
  Progress,
  SessionState,
  StartResult,
  SubmitResult,
} from '../models/assessment.js';
import {
  AlreadyStartedError,
  ControlMismatchError,
  InvalidDomainError,
  InvalidStateError,
} from '../errors.js';
import { clock } from '../utils/clock.js';
import { newAssessmentId } from '../utils/id.js';
import { createLogger } from '../utils/logger.js';
import type { ControlCatalog } from './control-catalog.js';
import type { EventPublisher } from './event-sink.js';
import { GAP_RULES, isGapClassification, DEFAULT_GAP_DESCRIPTION } from './gap-analysis.js';
import { roundTo } from './scoring.js';

const log = createLogger('session');

export interface SessionOptions {
  userId: string;
  catalog: ControlCatalog;
  assessmentId?: string;
  events?: EventPublisher;
}

export class AssessmentSession {
  private readonly catalog: ControlCatalog;
  private readonly events?: EventPublisher;
  private readonly state: SessionState;
  private controls: Control[] = [];

  constructor(options: SessionOptions) {
    this.catalog = options.catalog;
    this.events = options.events;
    this.state = {
      userId: options.userId,
      assessmentId: options.assessmentId ?? newAssessmentId(),
      domain: null,
      status: 'initialized',
      currentIndex: 0,
      totalControls: 0,
      responses: [],
      startedAt: null,
      completedAt: null,
    };
  }

  get assessmentId(): string {
    return this.state.assessmentId;
  }

  get userId(): string {
    return this.state.userId;
  }

  start(domain: string): StartResult {
    if (this.state.status !== 'initialized') {
      throw new AlreadyStartedError(this.state.assessmentId);
    }

    const controls = this.catalog.getByDomain(domain);
    const first = controls[0];
    if (!first) {
      throw new InvalidDomainError(domain);
    }

    this.controls = controls;
    this.state.domain = domain;
    this.state.status = 'in_progress';
    this.state.currentIndex = 0;
    this.state.totalControls = controls.length;
    const startedAt = clock.isoNow();
    this.state.startedAt = startedAt;

    this.emit({
      eventType: 'assessment.started',
      timestamp: startedAt,
      userId: this.state.userId,
      assessmentId: this.state.assessmentId,
      domain,
      controlCount: controls.length,
    });
    log.info(`Assessment started: ${this.state.assessmentId} for domain ${domain}`);

    return {
      assessmentId: this.state.assessmentId,
      domain,
      totalControls: controls.length,
      firstControl: toControlInfo(first),
    };
  }

  submitResponse(response: ClassifiedResponse): SubmitResult {
    if (this.state.status !== 'in_progress') {
      throw new InvalidStateError('submit a response', this.state.status);
    }

    const expected = this.controls[this.state.currentIndex];
    if (!expected) {
      throw new InvalidStateError('submit a response', this.state.status);
    }
    if (response.controlId !== expected.controlId) {
      throw new ControlMismatchError(expected.controlId, response.controlId);
    }

    this.state.responses.push({ ...response });
    this.state.currentIndex += 1;
    this.emitEvaluated(response);

    const next = this.controls[this.state.currentIndex];
    if (next) {
      return {
        status: 'in_progress',
        progress: this.getProgress(),
        nextControl: toControlInfo(next),
      };
    }

    this.state.status = 'completed';
    const completedAt = clock.isoNow();
    this.state.completedAt = completedAt;
    this.emit({
      eventType: 'assessment.completed',
      timestamp: completedAt,
      userId: this.state.userId,
      assessmentId: this.state.assessmentId,
      domain: expected.domain,
      totalResponses: this.state.responses.length,
    });
    log.info(`Assessment completed: ${this.state.assessmentId}`);

    return {
      status: 'completed',
      progress: this.getProgress(),
      totalResponses: this.state.responses.length,
    };
  }

  pause(): Progress {
    if (this.state.status !== 'in_progress') {
      throw new InvalidStateError('pause assessment', this.state.status);
    }
    this.state.status = 'paused';
    log.info(`Assessment paused: ${this.state.assessmentId}`);
    return this.getProgress();
  }

  resume(): Progress {
    if (this.state.status !== 'paused') {
      throw new InvalidStateError('resume assessment', this.state.status);
    }
    this.state.status = 'in_progress';
    log.info(`Assessment resumed: ${this.state.assessmentId}`);
    return this.getProgress();
  }

  getState(): SessionState {
    return {
      ...this.state,
      responses: this.state.responses.map((r) => ({ ...r })),
    };
  }

  getProgress(): Progress {
    const total = this.state.totalControls;
    const completed = this.state.currentIndex;
    return {
      completed,
      total,
      percentage: total > 0 ? roundTo((completed / total) * 100, 2) : 0,
      status: this.state.status,
    };
  }

  /** The control awaiting an answer; undefined before start and after completion. */
  currentControl(): Control | undefined {
    if (this.state.status === 'initialized' || this.state.status === 'completed') {
      return undefined;
    }
    return this.controls[this.state.currentIndex];
  }

  private emitEvaluated(response: ClassifiedResponse): void {
    const base = {
      timestamp: clock.isoNow(),
      userId: this.state.userId,
      assessmentId: this.state.assessmentId,
    };
    this.emit({
      ...base,
      eventType: 'control.evaluated',
      controlId: response.controlId,
      controlTitle: response.controlTitle,
      classification: response.classification,
      userResponse: response.userResponse,
      explanation: response.explanation,
      evidenceProvided: response.evidenceProvided,
    });

    if (isGapClassification(response.classification)) {
      const rule = GAP_RULES[response.classification];
      this.emit({
        ...base,
        eventType: 'gap.identified',
        controlId: response.controlId,
        controlTitle: response.controlTitle,
        severity: rule.severity,
        description: (response.explanation || DEFAULT_GAP_DESCRIPTION).slice(0, 500),
        remediationPriority: rule.priority,
        estimatedEffort: rule.effort,
      });
    }
  }

  private emit(event: AssessmentEvent): void {
    // Fire-and-forget: publish() resolves false on failure and never rejects.
    void this.events?.publish(event);
  }
}

export interface StartCommand {
  type: 'start';
  domain: string;
}

export interface SubmitCommand {
  type: 'submit';
  response: ClassifiedResponse;
}

export interface PauseCommand {
  type: 'pause';
}

export interface ResumeCommand {
  type: 'resume';
}

export interface GetStateCommand {
  type: 'getState';
}

export interface GetProgressCommand {
  type: 'getProgress';
}

export interface GetCurrentControlCommand {
  type: 'getCurrentControl';
}

export type SessionCommand =
  | StartCommand
  | SubmitCommand
  | PauseCommand
  | ResumeCommand
  | GetStateCommand
  | GetProgressCommand
  | GetCurrentControlCommand;

export type SessionReply = StartResult | SubmitResult | Progress | SessionState | Control | undefined;

export class SessionActor {
  private tail: Promise<void> = Promise.resolve();

  constructor(readonly session: AssessmentSession) {}

  get assessmentId(): string {
    return this.session.assessmentId;
  }

  get userId(): string {
    return this.session.userId;
  }

  ask(command: StartCommand): Promise<StartResult>;
  ask(command: SubmitCommand): Promise<SubmitResult>;
  ask(command: PauseCommand | ResumeCommand | GetProgressCommand): Promise<Progress>;
  ask(command: GetStateCommand): Promise<SessionState>;
  ask(command: GetCurrentControlCommand): Promise<Control | undefined>;
  ask(command: SessionCommand): Promise<SessionReply>;
  ask(command: SessionCommand): Promise<SessionReply> {
    return this.enqueue(() => this.dispatch(command));
  }

  private dispatch(command: SessionCommand): SessionReply {
    switch (command.type) {
      case 'start':
        return this.session.start(command.domain);
      case 'submit':
        return this.session.submitResponse(command.response);
      case 'pause':
        return this.session.pause();
      case 'resume':
        return this.session.resume();
      case 'getState':
        return this.session.getState();
      case 'getProgress':
        return this.session.getProgress();
      case 'getCurrentControl':
        return this.session.currentControl();
      default: {
        const unreachable: never = command;
        throw new Error(`Unknown session command: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private enqueue<T>(operation: () => T): Promise<T> {
    const result = this.tail.then(operation);
    // The caller sees a failure through `result`; the queue itself keeps draining.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
