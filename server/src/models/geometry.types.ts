export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Operation class of a weld point. Selects the height and dwell used when
 * the point is emitted.
 */
export type OperationClass = 'normal' | 'frangible' | 'stop' | 'pipette';

export const OPERATION_CLASSES: readonly OperationClass[] = ['normal', 'frangible', 'stop', 'pipette'];

export interface PathPoint extends Point {
  /** Overrides the owning path's class for this point only */
  readonly operation?: OperationClass;
}

export interface Path {
  id: string;
  operation: OperationClass;
  points: PathPoint[];
  pauseMessage?: string;
  pass?: number;
}

export interface BoundingBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  width: number;
  height: number;
  hasBounds: boolean;
}

export interface CenteringOffset {
  dx: number;
  dy: number;
}

// Geometry primitives accepted by the path builder. Angles are in degrees.

export interface LineShape {
  type: 'line';
  start: Point;
  end: Point;
}

export interface ArcShape {
  type: 'arc';
  center: Point;
  radius: number;
  startAngle: number;
  endAngle: number;
}

export interface CircleShape {
  type: 'circle';
  center: Point;
  radius: number;
}

export interface PolylineVertex extends Point {
  /** tan(includedAngle / 4) of the arc to the next vertex, 0 for a straight segment */
  bulge?: number;
}

export interface PolylineShape {
  type: 'polyline';
  vertices: PolylineVertex[];
  closed?: boolean;
}

export type OutlineSegment =
  | { kind: 'move'; to: Point }
  | { kind: 'line'; to: Point }
  | { kind: 'quadratic'; control: Point; to: Point }
  | { kind: 'cubic'; control1: Point; control2: Point; to: Point }
  | { kind: 'smoothQuadratic'; to: Point }
  | { kind: 'smoothCubic'; control2: Point; to: Point }
  | {
      kind: 'arc';
      rx: number;
      ry: number;
      rotation: number;
      largeArc: boolean;
      sweep: boolean;
      to: Point;
    }
  | { kind: 'close' };

export interface OutlineShape {
  type: 'outline';
  segments: OutlineSegment[];
}

export type Shape = LineShape | ArcShape | CircleShape | PolylineShape | OutlineShape;

export interface GeometryItem {
  id?: string;
  operation?: OperationClass;
  pauseMessage?: string;
  shape: Shape;
}
