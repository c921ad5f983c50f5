import { CenteringOffset, Path } from '../models/geometry.types';
import {
  EventConsumer,
  PathEvent,
  PathStartEvent,
  PipelineEvent,
} from '../models/path-event.types';
import { DegenerateGeometryError, EventSequenceError } from '../errors/conversion.errors';
import { resolvePathIds } from './geometry.service';

/**
 * Enforces `path_start -> point_added* -> path_complete` per path and
 * rejects `processing_complete` while a path is still open.
 */
export class SequenceGuard {
  private openPathId: string | null = null;

  check(event: PipelineEvent): void {
    switch (event.type) {
      case 'path_start':
        if (this.openPathId !== null) {
          throw new EventSequenceError(
            `path_start '${event.id}' received while path '${this.openPathId}' is still open`
          );
        }
        this.openPathId = event.id;
        break;
      case 'point_added':
        if (this.openPathId === null) {
          throw new EventSequenceError(
            `point_added (${event.x}, ${event.y}) received outside of an open path`
          );
        }
        break;
      case 'path_complete':
        if (this.openPathId === null) {
          throw new EventSequenceError(`path_complete '${event.id}' received with no open path`);
        }
        if (this.openPathId !== event.id) {
          throw new EventSequenceError(
            `path_complete '${event.id}' does not match open path '${this.openPathId}'`
          );
        }
        this.openPathId = null;
        break;
      case 'processing_complete':
        if (this.openPathId !== null) {
          throw new EventSequenceError(
            `processing_complete received while path '${this.openPathId}' is still open`
          );
        }
        break;
      default: {
        const unreachable: never = event;
        throw new EventSequenceError(`Unknown event: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  get hasOpenPath(): boolean {
    return this.openPathId !== null;
  }
}

export interface EventLogStatistics {
  totalEvents: number;
  eventTypes: Record<PathEvent['type'], number>;
}

/**
 * In-memory, ordered record of the path event stream. Recorded once during
 * pass 1 and replayed, in the same order, as many times as needed.
 */
export class EventLog {
  private readonly events: PathEvent[] = [];
  private guard = new SequenceGuard();
  private replaying = false;

  record(event: PathEvent): void {
    if (this.replaying) {
      throw new EventSequenceError('Cannot record events while a replay is in progress');
    }
    this.guard.check(event);
    this.events.push(event);
  }

  /**
   * Deliver every recorded event to each consumer subscribed to its type.
   * Point coordinates are shifted by `offset` on the way out; the log
   * itself is left untouched.
   */
  replay(consumers: EventConsumer[], offset: CenteringOffset = { dx: 0, dy: 0 }): void {
    if (this.replaying) {
      throw new EventSequenceError('Replay already in progress');
    }

    console.log(`[EventLog] Replaying ${this.events.length} events to ${consumers.length} consumers`);

    this.replaying = true;
    try {
      for (const recorded of this.events) {
        const event: PathEvent = recorded.type === 'point_added'
          ? { ...recorded, x: recorded.x + offset.dx, y: recorded.y + offset.dy }
          : recorded;

        for (const consumer of consumers) {
          if (consumer.subscriptions.has(event.type)) {
            consumer.handle(event);
          }
        }
      }
    } finally {
      this.replaying = false;
    }
  }

  clear(): void {
    this.events.length = 0;
    this.guard = new SequenceGuard();
  }

  get size(): number {
    return this.events.length;
  }

  /** True when the last recorded path has not been completed */
  get hasOpenPath(): boolean {
    return this.guard.hasOpenPath;
  }

  getStatistics(): EventLogStatistics {
    const eventTypes: Record<PathEvent['type'], number> = {
      path_start: 0,
      point_added: 0,
      path_complete: 0,
    };
    for (const event of this.events) {
      eventTypes[event.type]++;
    }
    return { totalEvents: this.events.length, eventTypes };
  }
}

/**
 * Flatten paths into the event stream: ids made unique, each point tagged
 * with its own class or the path's.
 */
export function pathsToEvents(paths: Path[]): PathEvent[] {
  const events: PathEvent[] = [];

  for (const path of resolvePathIds(paths)) {
    if (path.points.length === 0) {
      throw new DegenerateGeometryError(`Path '${path.id}' has no points`);
    }

    const start: PathStartEvent = { type: 'path_start', id: path.id, operation: path.operation };
    if (path.pauseMessage !== undefined) {
      start.pauseMessage = path.pauseMessage;
    }
    if (path.pass !== undefined) {
      start.pass = path.pass;
    }
    events.push(start);

    for (const point of path.points) {
      events.push({
        type: 'point_added',
        x: point.x,
        y: point.y,
        operation: point.operation ?? path.operation,
      });
    }

    events.push({ type: 'path_complete', id: path.id });
  }

  return events;
}
