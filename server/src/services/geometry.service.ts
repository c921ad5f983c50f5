import {
  GeometryItem,
  OutlineSegment,
  Path,
  Point,
  PolylineShape,
  Shape,
} from '../models/geometry.types';
import { DegenerateGeometryError } from '../errors/conversion.errors';
import {
  reflectControlPoint,
  subdivideSegment,
  vectorizeArc,
  vectorizeBulge,
  vectorizeCircle,
  vectorizeCubic,
  vectorizeEllipticalArc,
  vectorizeLine,
  vectorizeQuadratic,
} from './vectorizer.service';

const JOIN_TOLERANCE = 1e-9;

function samePoint(a: Point, b: Point): boolean {
  return Math.abs(a.x - b.x) <= JOIN_TOLERANCE && Math.abs(a.y - b.y) <= JOIN_TOLERANCE;
}

/**
 * Give every path a unique id. Later duplicates get `_1`, `_2`, ...
 * appended in input order, skipping ids that are already taken.
 */
export function resolvePathIds(paths: Path[]): Path[] {
  const used = new Set<string>();

  return paths.map(path => {
    let id = path.id;
    let counter = 1;
    while (used.has(id)) {
      id = `${path.id}_${counter}`;
      counter++;
    }
    used.add(id);
    return id === path.id ? path : { ...path, id };
  });
}

export class GeometryService {
  /**
   * Vectorize geometry items into weld paths
   */
  buildPaths(items: GeometryItem[], dotSpacing: number): Path[] {
    const paths = items.map((item, index) => {
      const id = item.id ?? `${item.shape.type}_${index + 1}`;
      const points = this.vectorizeShape(item.shape, dotSpacing, id);

      if (points.length === 0) {
        throw new DegenerateGeometryError(`Geometry '${id}' produced no points`);
      }

      const path: Path = {
        id,
        operation: item.operation ?? 'normal',
        points,
      };
      if (item.pauseMessage !== undefined) {
        path.pauseMessage = item.pauseMessage;
      }
      return path;
    });

    const totalPoints = paths.reduce((sum, p) => sum + p.points.length, 0);
    console.log(`[Geometry] Built ${paths.length} paths with ${totalPoints} points (spacing ${dotSpacing}mm)`);

    return resolvePathIds(paths);
  }

  /**
   * Vectorize a single shape into an ordered point list
   */
  vectorizeShape(shape: Shape, dotSpacing: number, label: string = shape.type): Point[] {
    switch (shape.type) {
      case 'line':
        return vectorizeLine(shape.start, shape.end, dotSpacing);
      case 'arc':
        return this.withPointFallback(label, shape.center, () =>
          vectorizeArc(shape.center, shape.radius, shape.startAngle, shape.endAngle, dotSpacing)
        );
      case 'circle':
        return this.withPointFallback(label, shape.center, () =>
          vectorizeCircle(shape.center, shape.radius, dotSpacing)
        );
      case 'polyline':
        return this.vectorizePolyline(shape, dotSpacing);
      case 'outline':
        return this.vectorizeOutline(shape.segments, dotSpacing);
      default: {
        const unreachable: never = shape;
        throw new Error(`Unsupported shape: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /**
   * Polyline vertices joined by straight or bulged segments. Each segment
   * is vectorized on its own and joined without repeating the shared vertex.
   */
  private vectorizePolyline(shape: PolylineShape, dotSpacing: number): Point[] {
    const { vertices } = shape;
    if (vertices.length === 0) return [];

    const points: Point[] = [];
    const segmentCount = shape.closed ? vertices.length : vertices.length - 1;

    if (segmentCount === 0) {
      return [{ x: vertices[0].x, y: vertices[0].y }];
    }

    for (let i = 0; i < segmentCount; i++) {
      const start = vertices[i];
      const end = vertices[(i + 1) % vertices.length];
      const from: Point = { x: start.x, y: start.y };
      const to: Point = { x: end.x, y: end.y };
      const bulge = start.bulge ?? 0;

      const segment = bulge === 0
        ? subdivideSegment(from, to, dotSpacing)
        : vectorizeBulge(from, to, bulge, dotSpacing);
      this.appendPoints(points, segment);
    }

    return points;
  }

  /**
   * Walk absolute outline segments, tracking the current point, the subpath
   * start and the last control point for smooth curves.
   */
  private vectorizeOutline(segments: OutlineSegment[], dotSpacing: number): Point[] {
    const points: Point[] = [];
    let current: Point = { x: 0, y: 0 };
    let subpathStart: Point = current;
    let lastQuadraticControl: Point | undefined;
    let lastCubicControl: Point | undefined;

    for (const segment of segments) {
      let quadraticControl: Point | undefined;
      let cubicControl: Point | undefined;

      switch (segment.kind) {
        case 'move':
          current = segment.to;
          subpathStart = segment.to;
          this.appendPoints(points, [segment.to]);
          break;
        case 'line':
          this.appendPoints(points, subdivideSegment(current, segment.to, dotSpacing));
          current = segment.to;
          break;
        case 'quadratic':
          this.appendPoints(points, vectorizeQuadratic(current, segment.control, segment.to, dotSpacing));
          quadraticControl = segment.control;
          current = segment.to;
          break;
        case 'smoothQuadratic': {
          const control = reflectControlPoint(lastQuadraticControl, current);
          this.appendPoints(points, vectorizeQuadratic(current, control, segment.to, dotSpacing));
          quadraticControl = control;
          current = segment.to;
          break;
        }
        case 'cubic':
          this.appendPoints(
            points,
            vectorizeCubic(current, segment.control1, segment.control2, segment.to, dotSpacing)
          );
          cubicControl = segment.control2;
          current = segment.to;
          break;
        case 'smoothCubic': {
          const control1 = reflectControlPoint(lastCubicControl, current);
          this.appendPoints(
            points,
            vectorizeCubic(current, control1, segment.control2, segment.to, dotSpacing)
          );
          cubicControl = segment.control2;
          current = segment.to;
          break;
        }
        case 'arc':
          this.appendPoints(points, vectorizeEllipticalArc(current, segment, dotSpacing));
          current = segment.to;
          break;
        case 'close':
          if (!samePoint(current, subpathStart)) {
            this.appendPoints(points, subdivideSegment(current, subpathStart, dotSpacing));
          }
          current = subpathStart;
          break;
        default: {
          const unreachable: never = segment;
          throw new Error(`Unsupported outline segment: ${JSON.stringify(unreachable)}`);
        }
      }

      // Smooth segments only reflect a control point from the same curve family
      lastQuadraticControl = quadraticControl;
      lastCubicControl = cubicControl;
    }

    return points;
  }

  private withPointFallback(label: string, fallback: Point, vectorize: () => Point[]): Point[] {
    try {
      return vectorize();
    } catch (error) {
      if (error instanceof DegenerateGeometryError) {
        console.warn(`[Geometry] ${label}: ${error.message}, falling back to a single point`);
        return [fallback];
      }
      throw error;
    }
  }

  private appendPoints(target: Point[], points: Point[]): void {
    for (const point of points) {
      const last = target[target.length - 1];
      if (last && samePoint(last, point)) continue;
      target.push(point);
    }
  }

  /**
   * Get bounding box of points
   */
  getBoundingBox(points: Point[]): {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
    width: number;
    height: number;
  } {
    if (points.length === 0) {
      return { minX: 0, minY: 0, maxX: 0, maxY: 0, width: 0, height: 0 };
    }

    const xs = points.map(p => p.x);
    const ys = points.map(p => p.y);

    const minX = Math.min(...xs);
    const minY = Math.min(...ys);
    const maxX = Math.max(...xs);
    const maxY = Math.max(...ys);

    return {
      minX,
      minY,
      maxX,
      maxY,
      width: maxX - minX,
      height: maxY - minY
    };
  }
}
