/**
 * Wires the service graph once per process from configuration.
 */
import type { AppConfig } from './config.js';
import { ControlCatalog } from './services/control-catalog.js';
import {
  EventPublisher,
  JsonlFileEventSink,
  LogEventSink,
  NullEventSink,
  type EventSink,
} from './services/event-sink.js';
import {
  LlmAssessmentAgent,
  OfflineClassifier,
  createAnthropicCaller,
  type Classifier,
  type QuestionGenerator,
} from './services/classifier.js';
import { SessionRegistry } from './services/session-registry.js';
import { InMemoryAssessmentRepository } from './services/assessment-repository.js';
import { AssessmentService } from './services/assessment.js';
import { createLogger } from './utils/logger.js';
import type { AppDependencies } from './app.js';

const log = createLogger('bootstrap');

export function createEventSink(config: AppConfig): EventSink {
  switch (config.eventSink) {
    case 'file':
      return new JsonlFileEventSink(config.eventLogPath);
    case 'log':
      return new LogEventSink();
    case 'none':
      return new NullEventSink();
  }
}

export function createAgent(config: AppConfig): Classifier & QuestionGenerator {
  const { apiKey, model, temperature, maxTokens } = config.classifier;
  if (!apiKey) {
    log.warn('ANTHROPIC_API_KEY not set; answers will receive the fallback classification');
    return new OfflineClassifier();
  }
  return new LlmAssessmentAgent(createAnthropicCaller({ apiKey, model, temperature, maxTokens }));
}

export async function createDependencies(config: AppConfig): Promise<AppDependencies> {
  const catalog = await ControlCatalog.load(config.controlsFile);
  const summary = catalog.summary();
  log.info(`Loaded ${summary.totalControls} controls across ${summary.domainCount} domains`);

  const events = new EventPublisher(createEventSink(config));
  const agent = createAgent(config);

  const assessments = new AssessmentService({
    catalog,
    registry: new SessionRegistry(catalog, events),
    classifier: agent,
    questions: agent,
    events,
    repository: new InMemoryAssessmentRepository(),
  });

  return { catalog, assessments };
}
