/**
 * Registry of live assessment sessions, keyed by assessment id.
 * Sessions are volatile and live only as long as this process.
 */
import { AssessmentNotFoundError } from '../errors.js';
import type { ControlCatalog } from './control-catalog.js';
import type { EventPublisher } from './event-sink.js';
import { AssessmentSession, SessionActor } from './assessment-session.js';

export class SessionRegistry {
  private readonly actors = new Map<string, SessionActor>();

  constructor(
    private readonly catalog: ControlCatalog,
    private readonly events?: EventPublisher,
  ) {}

  create(userId: string): SessionActor {
    const session = new AssessmentSession({ userId, catalog: this.catalog, events: this.events });
    const actor = new SessionActor(session);
    this.actors.set(actor.assessmentId, actor);
    return actor;
  }

  get(assessmentId: string): SessionActor | undefined {
    return this.actors.get(assessmentId);
  }

  require(assessmentId: string): SessionActor {
    const actor = this.actors.get(assessmentId);
    if (!actor) {
      throw new AssessmentNotFoundError(assessmentId);
    }
    return actor;
  }

  remove(assessmentId: string): boolean {
    return this.actors.delete(assessmentId);
  }

  size(): number {
    return this.actors.size;
  }
}
