import { BoundingBox, CenteringOffset, Path } from '../models/geometry.types';
import { EventConsumer, PipelineEvent } from '../models/path-event.types';
import { ReadonlyWelderConfig } from '../config/welder.config';
import { EventSequenceError } from '../errors/conversion.errors';
import { EventLog, EventLogStatistics, pathsToEvents } from './event-log.service';
import { ExtentCollector } from './extent-collector.service';
import { calculateCenteringOffset, fitsOnSurface } from './centering.service';
import { EmissionSummary, GcodeEmitter } from './gcode-emitter.service';
import { GcodeSink } from './gcode-sink.service';
import { expandWeldPasses } from './multipass.service';

export interface PatternAnalysis {
  bounds: BoundingBox;
  offset: CenteringOffset;
  fitsOnBed: boolean;
  pathCount: number;
  pointCount: number;
}

export interface ConversionResult {
  summary: EmissionSummary;
  bounds: BoundingBox;
  offset: CenteringOffset;
  fitsOnBed: boolean;
  eventCount: number;
  statistics: EventLogStatistics;
}

/**
 * One conversion run. Owns its subscriber list and event log.
 *
 * Pass 1 records the event stream and fans it out to the subscribers (the
 * extent collector among them). With multipass welding enabled, weld paths
 * are split into one path per pass before they are recorded. The centering offset is computed from the
 * collected bounds, then the log is replayed with that offset into a fresh
 * G-code emitter.
 */
export class ConversionPipeline {
  private readonly subscribers: EventConsumer[] = [];
  private readonly log = new EventLog();
  private used = false;

  constructor(private readonly config: ReadonlyWelderConfig) {}

  subscribe(consumer: EventConsumer): void {
    this.subscribers.push(consumer);
  }

  publish(event: PipelineEvent): void {
    for (const subscriber of this.subscribers) {
      if (subscriber.subscriptions.has(event.type)) {
        subscriber.handle(event);
      }
    }
  }

  /**
   * Pass 1 only: bounds and the offset that would center them on the bed.
   */
  analyze(paths: Path[]): PatternAnalysis {
    this.claim();
    try {
      return this.collect(paths);
    } finally {
      this.log.clear();
    }
  }

  convert(paths: Path[], sink: GcodeSink): ConversionResult {
    this.claim();
    try {
      const analysis = this.collect(paths);
      const statistics = this.log.getStatistics();
      const eventCount = this.log.size;

      const emitter = new GcodeEmitter(sink, this.config);
      const summary = emitter.run(consumer => {
        this.log.replay([consumer], analysis.offset);
        consumer.handle({ type: 'processing_complete' });
      });
      this.publish({ type: 'processing_complete' });

      console.log(
        `[Pipeline] Wrote ${summary.outputName} (${summary.bytesWritten} bytes) from ${eventCount} events`
      );

      return {
        summary,
        bounds: analysis.bounds,
        offset: analysis.offset,
        fitsOnBed: analysis.fitsOnBed,
        eventCount,
        statistics,
      };
    } finally {
      this.log.clear();
    }
  }

  private claim(): void {
    if (this.used) {
      throw new EventSequenceError('A conversion pipeline handles a single run');
    }
    this.used = true;
  }

  private collect(paths: Path[]): PatternAnalysis {
    const extents = new ExtentCollector();
    this.subscribe(extents);

    for (const event of pathsToEvents(expandWeldPasses(paths, this.config))) {
      this.log.record(event);
      this.publish(event);
    }

    if (this.log.hasOpenPath) {
      throw new EventSequenceError('Event stream ended with a path still open');
    }

    const { bedSizeX, bedSizeY } = this.config.printer;
    const bounds = extents.finalize();
    const offset = calculateCenteringOffset(bounds, bedSizeX, bedSizeY);
    const statistics = this.log.getStatistics();

    console.log(
      `[Pipeline] Pass 1 recorded ${this.log.size} events ` +
        `(${statistics.eventTypes.path_start} paths, ${extents.totalPoints} points)`
    );

    return {
      bounds,
      offset,
      fitsOnBed: fitsOnSurface(bounds, offset, bedSizeX, bedSizeY),
      pathCount: statistics.eventTypes.path_start,
      pointCount: extents.totalPoints,
    };
  }
}
