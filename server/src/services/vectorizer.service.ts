import { Point } from '../models/geometry.types';
import { DegenerateGeometryError } from '../errors/conversion.errors';

const EPSILON = 1e-10;

function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

function largestGap(points: Point[]): number {
  let gap = 0;
  for (let i = 1; i < points.length; i++) {
    gap = Math.max(gap, distance(points[i - 1], points[i]));
  }
  return gap;
}

function lerp(a: Point, b: Point, t: number): Point {
  return {
    x: a.x + (b.x - a.x) * t,
    y: a.y + (b.y - a.y) * t,
  };
}

function assertSpacing(dotSpacing: number): void {
  if (!(dotSpacing > 0) || !Number.isFinite(dotSpacing)) {
    throw new RangeError(`dotSpacing must be a positive number, got ${dotSpacing}`);
  }
}

/**
 * Evenly spaced points from start to end, both included, no two
 * consecutive points further apart than dotSpacing.
 * A zero-length segment yields its single point.
 */
export function subdivideSegment(start: Point, end: Point, dotSpacing: number): Point[] {
  assertSpacing(dotSpacing);

  const length = distance(start, end);
  if (length < EPSILON) {
    return [start];
  }

  const segments = Math.max(1, Math.ceil(length / dotSpacing));
  const points: Point[] = [start];
  for (let i = 1; i < segments; i++) {
    points.push(lerp(start, end, i / segments));
  }
  points.push(end);
  return points;
}

/**
 * Vectorize a standalone line. Lines shorter than dotSpacing collapse to
 * their midpoint so a short stroke gets one weld instead of two
 * overlapping ones.
 */
export function vectorizeLine(start: Point, end: Point, dotSpacing: number): Point[] {
  assertSpacing(dotSpacing);

  if (distance(start, end) < dotSpacing) {
    return [lerp(start, end, 0.5)];
  }
  return subdivideSegment(start, end, dotSpacing);
}

/**
 * Circular arc from startAngle to endAngle (degrees, counter-clockwise).
 * An end angle below the start angle wraps around by 360°.
 */
export function vectorizeArc(
  center: Point,
  radius: number,
  startAngle: number,
  endAngle: number,
  dotSpacing: number
): Point[] {
  assertSpacing(dotSpacing);
  if (!(radius > 0)) {
    throw new DegenerateGeometryError(`Arc radius must be positive, got ${radius}`);
  }

  let sweep = endAngle - startAngle;
  if (sweep < 0) {
    sweep += 360;
  }

  const pointAt = (degrees: number): Point => {
    const radians = (degrees * Math.PI) / 180;
    return {
      x: center.x + radius * Math.cos(radians),
      y: center.y + radius * Math.sin(radians),
    };
  };

  if (sweep === 0) {
    return [pointAt(startAngle)];
  }

  const arcLength = (sweep * Math.PI * radius) / 180;
  const segments = Math.max(2, Math.round(arcLength / dotSpacing));

  const points: Point[] = [];
  for (let i = 0; i <= segments; i++) {
    points.push(pointAt(startAngle + (sweep * i) / segments));
  }
  return points;
}

export function vectorizeCircle(center: Point, radius: number, dotSpacing: number): Point[] {
  return vectorizeArc(center, radius, 0, 360, dotSpacing);
}

/**
 * Curve length estimate: mean of the control polygon length and the chord.
 * Cheap, and close enough to choose a segment count.
 */
export function estimateBezierLength(controlPoints: readonly Point[]): number {
  if (controlPoints.length < 2) return 0;

  let polygon = 0;
  for (let i = 1; i < controlPoints.length; i++) {
    polygon += distance(controlPoints[i - 1], controlPoints[i]);
  }
  const chord = distance(controlPoints[0], controlPoints[controlPoints.length - 1]);
  return (polygon + chord) / 2;
}

function sampleCurve(
  start: Point,
  end: Point,
  segments: number,
  evaluate: (t: number) => Point
): Point[] {
  const points: Point[] = [start];
  for (let i = 1; i < segments; i++) {
    points.push(evaluate(i / segments));
  }
  points.push(end);
  return points;
}

export function vectorizeQuadratic(p0: Point, p1: Point, p2: Point, dotSpacing: number): Point[] {
  assertSpacing(dotSpacing);

  const segments = Math.max(1, Math.round(estimateBezierLength([p0, p1, p2]) / dotSpacing));

  // B(t) = (1-t)²P0 + 2(1-t)tP1 + t²P2
  return sampleCurve(p0, p2, segments, (t) => {
    const mt = 1 - t;
    return {
      x: mt * mt * p0.x + 2 * mt * t * p1.x + t * t * p2.x,
      y: mt * mt * p0.y + 2 * mt * t * p1.y + t * t * p2.y,
    };
  });
}

export function vectorizeCubic(
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  dotSpacing: number
): Point[] {
  assertSpacing(dotSpacing);

  const segments = Math.max(1, Math.round(estimateBezierLength([p0, p1, p2, p3]) / dotSpacing));

  // B(t) = (1-t)³P0 + 3(1-t)²tP1 + 3(1-t)t²P2 + t³P3
  return sampleCurve(p0, p3, segments, (t) => {
    const mt = 1 - t;
    const a = mt * mt * mt;
    const b = 3 * mt * mt * t;
    const c = 3 * mt * t * t;
    const d = t * t * t;
    return {
      x: a * p0.x + b * p1.x + c * p2.x + d * p3.x,
      y: a * p0.y + b * p1.y + c * p2.y + d * p3.y,
    };
  });
}

/**
 * Implicit first control point of a smooth curve segment: the previous
 * segment's last control point mirrored through the current position, or
 * the current position itself when there is no previous curve.
 */
export function reflectControlPoint(previousControl: Point | undefined, current: Point): Point {
  if (!previousControl) {
    return current;
  }
  return {
    x: 2 * current.x - previousControl.x,
    y: 2 * current.y - previousControl.y,
  };
}

export interface EllipticalArcParams {
  rx: number;
  ry: number;
  /** x-axis rotation in degrees */
  rotation: number;
  largeArc: boolean;
  sweep: boolean;
  to: Point;
}

export interface EllipticalArcCenter {
  cx: number;
  cy: number;
  rx: number;
  ry: number;
  /** x-axis rotation in radians */
  phi: number;
  theta1: number;
  deltaTheta: number;
}

function vectorAngle(ux: number, uy: number, vx: number, vy: number): number {
  return Math.atan2(ux * vy - uy * vx, ux * vx + uy * vy);
}

/**
 * Endpoint to center parameterization of an SVG elliptical arc.
 * Radii too small to span the chord are scaled up uniformly.
 * Returns null for zero radii or coincident endpoints.
 */
export function svgArcToCenter(from: Point, arc: EllipticalArcParams): EllipticalArcCenter | null {
  const { to } = arc;
  if (from.x === to.x && from.y === to.y) return null;
  if (arc.rx === 0 || arc.ry === 0) return null;

  let rx = Math.abs(arc.rx);
  let ry = Math.abs(arc.ry);
  const phi = (arc.rotation * Math.PI) / 180;
  const cosPhi = Math.cos(phi);
  const sinPhi = Math.sin(phi);

  const dx = (from.x - to.x) / 2;
  const dy = (from.y - to.y) / 2;
  const x1p = cosPhi * dx + sinPhi * dy;
  const y1p = -sinPhi * dx + cosPhi * dy;

  const lambda = (x1p * x1p) / (rx * rx) + (y1p * y1p) / (ry * ry);
  if (lambda > 1) {
    const scale = Math.sqrt(lambda);
    rx *= scale;
    ry *= scale;
  }

  const sign = arc.largeArc === arc.sweep ? -1 : 1;
  const numerator = Math.max(0, rx * rx * ry * ry - rx * rx * y1p * y1p - ry * ry * x1p * x1p);
  const denominator = rx * rx * y1p * y1p + ry * ry * x1p * x1p;
  const coefficient = sign * Math.sqrt(numerator / denominator);

  const cxp = (coefficient * rx * y1p) / ry;
  const cyp = (-coefficient * ry * x1p) / rx;

  const cx = cosPhi * cxp - sinPhi * cyp + (from.x + to.x) / 2;
  const cy = sinPhi * cxp + cosPhi * cyp + (from.y + to.y) / 2;

  const ux = (x1p - cxp) / rx;
  const uy = (y1p - cyp) / ry;
  const vx = (-x1p - cxp) / rx;
  const vy = (-y1p - cyp) / ry;

  const theta1 = vectorAngle(1, 0, ux, uy);
  let deltaTheta = vectorAngle(ux, uy, vx, vy);

  if (!arc.sweep && deltaTheta > 0) {
    deltaTheta -= 2 * Math.PI;
  } else if (arc.sweep && deltaTheta < 0) {
    deltaTheta += 2 * Math.PI;
  }

  return { cx, cy, rx, ry, phi, theta1, deltaTheta };
}

function ellipseSpeed(rx: number, ry: number, t: number): number {
  const sin = Math.sin(t);
  const cos = Math.cos(t);
  return Math.sqrt(rx * rx * sin * sin + ry * ry * cos * cos);
}

/**
 * Cumulative arc length at `samples` equal angle steps from theta1, by the
 * midpoint rule. Entry i is the length up to theta1 + i * deltaTheta / samples.
 */
function cumulativeArcLength(rx: number, ry: number, theta1: number, deltaTheta: number, samples: number): number[] {
  const step = deltaTheta / samples;
  const table = [0];
  for (let i = 0; i < samples; i++) {
    table.push(table[i] + ellipseSpeed(rx, ry, theta1 + (i + 0.5) * step) * Math.abs(step));
  }
  return table;
}

/** Angle at which the tabulated arc length reaches `target` */
function angleAtLength(table: number[], theta1: number, deltaTheta: number, target: number): number {
  let low = 0;
  let high = table.length - 1;
  while (high - low > 1) {
    const mid = (low + high) >> 1;
    if (table[mid] <= target) {
      low = mid;
    } else {
      high = mid;
    }
  }

  const span = table[high] - table[low];
  const fraction = span > 0 ? (target - table[low]) / span : 0;
  return theta1 + ((low + fraction) / (table.length - 1)) * deltaTheta;
}

/**
 * Arc length of an ellipse between theta1 and theta1 + deltaTheta, by
 * midpoint integration of sqrt(rx²sin²t + ry²cos²t).
 */
export function ellipticalArcLength(rx: number, ry: number, theta1: number, deltaTheta: number): number {
  if (Math.abs(rx - ry) < EPSILON) {
    return rx * Math.abs(deltaTheta);
  }

  const samples = Math.max(10, Math.ceil(Math.abs(deltaTheta) * 20));
  return cumulativeArcLength(rx, ry, theta1, deltaTheta, samples)[samples];
}

/**
 * Vectorize an SVG elliptical arc starting at `from`, at equal arc-length
 * steps. Degenerate arcs (zero radius, coincident endpoints) become a
 * straight move, represented by the end point alone.
 */
export function vectorizeEllipticalArc(from: Point, arc: EllipticalArcParams, dotSpacing: number): Point[] {
  assertSpacing(dotSpacing);

  const center = svgArcToCenter(from, arc);
  if (!center) {
    return [arc.to];
  }

  const { cx, cy, rx, ry, phi, theta1, deltaTheta } = center;
  const cosPhi = Math.cos(phi);
  const sinPhi = Math.sin(phi);
  const pointAt = (angle: number): Point => {
    const localX = rx * Math.cos(angle);
    const localY = ry * Math.sin(angle);
    return {
      x: cx + localX * cosPhi - localY * sinPhi,
      y: cy + localX * sinPhi + localY * cosPhi,
    };
  };

  const length = ellipticalArcLength(rx, ry, theta1, deltaTheta);
  const estimate = Math.max(1, Math.ceil(length / dotSpacing));
  const table = cumulativeArcLength(rx, ry, theta1, deltaTheta, Math.max(256, estimate * 16));
  const total = table[table.length - 1];

  // The table is approximate: add segments until every gap is within the spacing
  for (let segments = estimate; ; segments++) {
    const points: Point[] = [from];
    for (let i = 1; i < segments; i++) {
      points.push(pointAt(angleAtLength(table, theta1, deltaTheta, (total * i) / segments)));
    }
    points.push(arc.to);

    if (largestGap(points) <= dotSpacing) {
      return points;
    }
  }
}

/**
 * Vectorize a CAD bulge arc (bulge = tan(includedAngle / 4)) directly along
 * the arc. A positive bulge places the arc on the left of the chord
 * direction: from (0,0) to (2,0), bulge 1 passes through (1,1).
 */
export function vectorizeBulge(start: Point, end: Point, bulge: number, dotSpacing: number): Point[] {
  assertSpacing(dotSpacing);

  const chord = distance(start, end);
  if (chord < EPSILON) {
    return [start];
  }
  if (Math.abs(bulge) < EPSILON) {
    return subdivideSegment(start, end, dotSpacing);
  }

  const includedAngle = 4 * Math.atan(bulge);
  const halfAngle = Math.abs(includedAngle) / 2;
  const radius = chord / (2 * Math.sin(halfAngle));

  // Signed distance from chord midpoint to center; negative past a semicircle
  const apothem = radius * Math.cos(halfAngle);

  // Left-hand normal of the chord
  const normalX = -(end.y - start.y) / chord;
  const normalY = (end.x - start.x) / chord;
  const side = bulge > 0 ? -1 : 1;

  const centerX = (start.x + end.x) / 2 + side * apothem * normalX;
  const centerY = (start.y + end.y) / 2 + side * apothem * normalY;

  const startAngle = Math.atan2(start.y - centerY, start.x - centerX);
  const sweep = -includedAngle;

  const arcLength = radius * Math.abs(includedAngle);
  const segments = Math.max(2, Math.ceil(arcLength / dotSpacing));

  return sampleCurve(start, end, segments, (t) => {
    const angle = startAngle + t * sweep;
    return {
      x: centerX + radius * Math.cos(angle),
      y: centerY + radius * Math.sin(angle),
    };
  });
}
