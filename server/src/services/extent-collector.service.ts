import { BoundingBox } from '../models/geometry.types';
import {
  EventConsumer,
  PipelineEvent,
  PipelineEventType,
} from '../models/path-event.types';

/**
 * Pass-1 consumer: folds point events into the pattern's bounding box.
 */
export class ExtentCollector implements EventConsumer {
  readonly subscriptions: ReadonlySet<PipelineEventType> = new Set<PipelineEventType>(['point_added']);

  private minX: number | null = null;
  private minY: number | null = null;
  private maxX: number | null = null;
  private maxY: number | null = null;
  private pointCount = 0;

  handle(event: PipelineEvent): void {
    if (event.type !== 'point_added') return;

    const { x, y } = event;
    if (this.minX === null || x < this.minX) this.minX = x;
    if (this.maxX === null || x > this.maxX) this.maxX = x;
    if (this.minY === null || y < this.minY) this.minY = y;
    if (this.maxY === null || y > this.maxY) this.maxY = y;
    this.pointCount++;
  }

  get totalPoints(): number {
    return this.pointCount;
  }

  /**
   * Current extents. Safe to call at any time and more than once; returns a
   * zero box with `hasBounds: false` until a point has been seen.
   */
  finalize(): BoundingBox {
    if (this.minX === null || this.minY === null || this.maxX === null || this.maxY === null) {
      return { minX: 0, minY: 0, maxX: 0, maxY: 0, width: 0, height: 0, hasBounds: false };
    }

    return {
      minX: this.minX,
      minY: this.minY,
      maxX: this.maxX,
      maxY: this.maxY,
      width: this.maxX - this.minX,
      height: this.maxY - this.minY,
      hasBounds: true,
    };
  }
}
