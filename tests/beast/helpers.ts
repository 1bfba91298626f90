/**
 * Beast Test Helpers: fixtures, fakes and an in-process HTTP client.
 */
import { createServer } from 'node:http';
import type { Express } from 'express';
import { createApp } from '../../src/app.js';
import type { Control } from '../../src/models/control.js';
import type { AssessmentEvent } from '../../src/models/events.js';
import type { ClassificationResult, ClassifiedResponse } from '../../src/models/assessment.js';
import type { Classification } from '../../src/models/shared.js';
import { ControlCatalog } from '../../src/services/control-catalog.js';
import { EventPublisher, type EventSink } from '../../src/services/event-sink.js';
import type { Classifier, QuestionGenerator } from '../../src/services/classifier.js';
import { SessionRegistry } from '../../src/services/session-registry.js';
import { InMemoryAssessmentRepository } from '../../src/services/assessment-repository.js';
import { AssessmentService } from '../../src/services/assessment.js';
import { createLogger } from '../../src/utils/logger.js';

export const ACCESS_CONTROL = 'Access Control';
export const AUDIT = 'Audit and Accountability';

function control(controlId: string, domain: string, title: string): Control {
  return {
    controlId,
    domain,
    title,
    requirement: `${title} requirement.`,
    assessmentObjective: `Determine whether ${title.toLowerCase()} is implemented.`,
    discussion: `Discussion of ${title.toLowerCase()}.`,
    nistReference: `NIST SP 800-171 ${controlId.slice(-5)}`,
  };
}

export const TEST_CONTROLS: Control[] = [
  control('AC.L2-3.1.1', ACCESS_CONTROL, 'Authorized Access Control'),
  control('AC.L2-3.1.2', ACCESS_CONTROL, 'Transaction Control'),
  control('AU.L2-3.3.1', AUDIT, 'System Auditing'),
  control('AC.L2-3.1.3', ACCESS_CONTROL, 'Control CUI Flow'),
  control('AC.L2-3.1.5', ACCESS_CONTROL, 'Least Privilege'),
  control('AU.L2-3.3.2', AUDIT, 'User Accountability'),
];

export function testCatalog(): ControlCatalog {
  return ControlCatalog.fromRecords(TEST_CONTROLS);
}

export function classified(
  controlId: string,
  classification: Classification,
  extra: Partial<ClassifiedResponse> = {},
): ClassifiedResponse {
  return {
    controlId,
    controlTitle: `Title of ${controlId}`,
    userResponse: `Answer for ${controlId}`,
    classification,
    evidenceProvided: false,
    createdAt: '2026-01-01T00:00:00.000Z',
    ...extra,
  };
}

export interface EmittedEvent {
  topic: string;
  event: AssessmentEvent;
  key?: string;
}

export class MemoryEventSink implements EventSink {
  readonly emitted: EmittedEvent[] = [];

  async emit(topic: string, event: AssessmentEvent, key?: string): Promise<boolean> {
    this.emitted.push({ topic, event, key });
    return true;
  }

  types(): string[] {
    return this.emitted.map((e) => e.event.eventType);
  }
}

/**
 * Classifies by the first word of the answer:
 * "yes" → compliant, "partly" → partial, anything else → non_compliant.
 */
export class KeywordClassifier implements Classifier, QuestionGenerator {
  readonly calls: string[] = [];

  async classify(ctrl: Control, userResponse: string): Promise<ClassificationResult> {
    this.calls.push(ctrl.controlId);
    const word = userResponse.trim().split(/[\s,.]+/)[0]?.toLowerCase() ?? '';
    if (word === 'yes') {
      return { classification: 'compliant', explanation: 'Fully implemented.', confidence: 0.9 };
    }
    if (word === 'partly') {
      return {
        classification: 'partial',
        explanation: 'Policy exists without audit trail.',
        remediation: 'Add approval logging',
        confidence: 0.8,
      };
    }
    return {
      classification: 'non_compliant',
      explanation: 'No policy in place.',
      remediation: 'Write a policy\nTrain staff',
      confidence: 0.85,
    };
  }

  async generateQuestion(ctrl: Control): Promise<string> {
    return `How do you implement ${ctrl.title}?`;
  }
}

export interface TestContext {
  app: Express;
  catalog: ControlCatalog;
  service: AssessmentService;
  registry: SessionRegistry;
  repository: InMemoryAssessmentRepository;
  sink: MemoryEventSink;
  classifier: KeywordClassifier;
}

export function buildTestContext(
  classifier = new KeywordClassifier(),
  repository = new InMemoryAssessmentRepository(),
): TestContext {
  const catalog = testCatalog();
  const sink = new MemoryEventSink();
  const events = new EventPublisher(sink, createLogger('test-events'));
  const registry = new SessionRegistry(catalog, events);
  const service = new AssessmentService({
    catalog,
    registry,
    classifier,
    questions: classifier,
    events,
    repository,
  });
  return {
    app: createApp({ catalog, assessments: service }),
    catalog,
    service,
    registry,
    repository,
    sink,
    classifier,
  };
}

export interface TestResponse {
  status: number;
  contentType: string;
  text: string;
  body: Record<string, unknown>;
}

export interface RequestOptions {
  body?: unknown;
  rawBody?: string;
  userId?: string;
}

/**
 * Make a request to the app on an ephemeral port and close the server afterwards.
 */
export async function request(
  app: Express,
  method: 'GET' | 'POST',
  path: string,
  options: RequestOptions = {},
): Promise<TestResponse> {
  const server = createServer(app);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  try {
    const addr = server.address();
    const port = typeof addr === 'object' && addr ? addr.port : 0;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (options.userId !== undefined) headers['x-user-id'] = options.userId;

    const res = await fetch(`http://127.0.0.1:${port}${path}`, {
      method,
      headers,
      body: options.rawBody ?? (options.body !== undefined ? JSON.stringify(options.body) : undefined),
    });
    const text = await res.text();
    const contentType = res.headers.get('content-type') ?? '';
    const body: Record<string, unknown> = contentType.includes('application/json') ? JSON.parse(text) : {};
    return { status: res.status, contentType, text, body };
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  }
}

/** Narrow an unknown JSON value to an object for property access in assertions. */
export function obj(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Expected an object, got ${JSON.stringify(value)}`);
  }
  return Object.fromEntries(Object.entries(value));
}
