/**
 * Event sinks: best-effort delivery of assessment events.
 *
 * A sink reports success as a boolean. The publisher never lets a sink
 * failure reach the caller.
 */
import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ASSESSMENT_TOPIC, type AssessmentEvent } from '../models/events.js';
import { errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface EventSink {
  emit(topic: string, event: AssessmentEvent, key?: string): Promise<boolean>;
}

/** Appends one `{ topic, key, value }` JSON line per event, in emit order. */
export class JsonlFileEventSink implements EventSink {
  private ready: Promise<string | undefined> | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly path: string) {}

  emit(topic: string, event: AssessmentEvent, key?: string): Promise<boolean> {
    const line = JSON.stringify({ topic, key: key ?? null, value: event });
    const result = this.tail.then(() => this.append(line));
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async append(line: string): Promise<boolean> {
    this.ready ??= mkdir(dirname(this.path), { recursive: true });
    try {
      await this.ready;
    } catch (err: unknown) {
      this.ready = null;
      throw err;
    }
    await appendFile(this.path, `${line}\n`, 'utf8');
    return true;
  }
}

export class LogEventSink implements EventSink {
  constructor(private readonly log: Logger = createLogger('events')) {}

  async emit(topic: string, event: AssessmentEvent, key?: string): Promise<boolean> {
    this.log.debug(`${topic} ${event.eventType} key=${key ?? '-'}`);
    return true;
  }
}

export class NullEventSink implements EventSink {
  async emit(): Promise<boolean> {
    return false;
  }
}

export class EventPublisher {
  private readonly log: Logger;

  constructor(
    private readonly sink: EventSink,
    log: Logger = createLogger('events'),
  ) {
    this.log = log;
  }

  /** Resolves false instead of rejecting when delivery fails. */
  async publish(event: AssessmentEvent): Promise<boolean> {
    try {
      return await this.sink.emit(ASSESSMENT_TOPIC, event, event.assessmentId);
    } catch (err: unknown) {
      this.log.warn(`Failed to emit ${event.eventType} for ${event.assessmentId}: ${errorMessage(err)}`);
      return false;
    }
  }
}
