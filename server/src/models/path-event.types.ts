import { OperationClass } from './geometry.types';

export interface PathStartEvent {
  type: 'path_start';
  id: string;
  operation: OperationClass;
  pauseMessage?: string;
  /** 1-based weld pass, present when a path was split into passes */
  pass?: number;
}

export interface PointAddedEvent {
  type: 'point_added';
  x: number;
  y: number;
  operation: OperationClass;
}

export interface PathCompleteEvent {
  type: 'path_complete';
  id: string;
}

export type PathEvent = PathStartEvent | PointAddedEvent | PathCompleteEvent;

/** Terminal signal sent once after the last replayed event */
export interface ProcessingCompleteEvent {
  type: 'processing_complete';
}

export type PipelineEvent = PathEvent | ProcessingCompleteEvent;

export type PipelineEventType = PipelineEvent['type'];

/**
 * Anything that can receive events from the pipeline or a replay.
 * Only events whose type is in `subscriptions` are delivered.
 */
export interface EventConsumer {
  readonly subscriptions: ReadonlySet<PipelineEventType>;
  handle(event: PipelineEvent): void;
}
