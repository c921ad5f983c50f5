import {
  GeometryItem,
  OPERATION_CLASSES,
  OperationClass,
  OutlineSegment,
  Path,
  PathPoint,
  Point,
  PolylineShape,
  PolylineVertex,
  Shape,
} from '../models/geometry.types';
import { RequestValidationError } from '../errors/conversion.errors';
import { CONTROL_CHARACTERS } from '../config/welder.config';

/**
 * Body accepted by the conversion endpoints. Exactly one of `paths`
 * (already vectorized) or `items` (geometry to vectorize) is present.
 */
export interface ConversionRequest {
  filename?: string;
  dotSpacing?: number;
  config?: unknown;
  paths?: Path[];
  items?: GeometryItem[];
}

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOperationClass(value: unknown): value is OperationClass {
  return OPERATION_CLASSES.some(operation => operation === value);
}

function requireRecord(value: unknown, where: string): Json {
  if (!isRecord(value)) {
    throw new RequestValidationError(`${where} must be an object`);
  }
  return value;
}

function requireArray(value: unknown, where: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new RequestValidationError(`${where} must be an array`);
  }
  return value;
}

function requireNumber(value: unknown, where: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new RequestValidationError(`${where} must be a finite number`);
  }
  return value;
}

function optionalNumber(value: unknown, where: string): number | undefined {
  return value === undefined ? undefined : requireNumber(value, where);
}

function optionalString(value: unknown, where: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new RequestValidationError(`${where} must be a string`);
  }
  return value;
}

/** A string that ends up inside a G-code line */
function optionalText(value: unknown, where: string): string | undefined {
  const text = optionalString(value, where);
  if (text !== undefined && CONTROL_CHARACTERS.test(text)) {
    throw new RequestValidationError(`${where} must not contain control characters`);
  }
  return text;
}

function optionalBoolean(value: unknown, where: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new RequestValidationError(`${where} must be a boolean`);
  }
  return value;
}

function optionalOperation(value: unknown, where: string): OperationClass | undefined {
  if (value === undefined) return undefined;
  if (!isOperationClass(value)) {
    throw new RequestValidationError(`${where} must be one of ${OPERATION_CLASSES.join(', ')}`);
  }
  return value;
}

function parsePoint(value: unknown, where: string): Point {
  const raw = requireRecord(value, where);
  return { x: requireNumber(raw.x, `${where}.x`), y: requireNumber(raw.y, `${where}.y`) };
}

function parsePathPoint(value: unknown, where: string): PathPoint {
  const raw = requireRecord(value, where);
  const point = parsePoint(raw, where);
  const operation = optionalOperation(raw.operation, `${where}.operation`);
  return operation === undefined ? point : { ...point, operation };
}

function parsePath(value: unknown, index: number): Path {
  const where = `paths[${index}]`;
  const raw = requireRecord(value, where);

  const id = optionalText(raw.id, `${where}.id`) ?? `path_${index + 1}`;
  const points = requireArray(raw.points, `${where}.points`).map((point, i) =>
    parsePathPoint(point, `${where}.points[${i}]`)
  );
  if (points.length === 0) {
    throw new RequestValidationError(`${where}.points must not be empty`);
  }

  const path: Path = {
    id,
    operation: optionalOperation(raw.operation, `${where}.operation`) ?? 'normal',
    points,
  };
  const pauseMessage = optionalText(raw.pauseMessage, `${where}.pauseMessage`);
  if (pauseMessage !== undefined) {
    path.pauseMessage = pauseMessage;
  }
  return path;
}

function parseVertex(value: unknown, where: string): PolylineVertex {
  const raw = requireRecord(value, where);
  const point = parsePoint(raw, where);
  const bulge = optionalNumber(raw.bulge, `${where}.bulge`);
  return bulge === undefined ? point : { ...point, bulge };
}

function parseSegment(value: unknown, where: string): OutlineSegment {
  const raw = requireRecord(value, where);
  const to = (): Point => parsePoint(raw.to, `${where}.to`);

  switch (raw.kind) {
    case 'move':
      return { kind: 'move', to: to() };
    case 'line':
      return { kind: 'line', to: to() };
    case 'quadratic':
      return { kind: 'quadratic', control: parsePoint(raw.control, `${where}.control`), to: to() };
    case 'cubic':
      return {
        kind: 'cubic',
        control1: parsePoint(raw.control1, `${where}.control1`),
        control2: parsePoint(raw.control2, `${where}.control2`),
        to: to(),
      };
    case 'smoothQuadratic':
      return { kind: 'smoothQuadratic', to: to() };
    case 'smoothCubic':
      return { kind: 'smoothCubic', control2: parsePoint(raw.control2, `${where}.control2`), to: to() };
    case 'arc':
      return {
        kind: 'arc',
        rx: requireNumber(raw.rx, `${where}.rx`),
        ry: requireNumber(raw.ry, `${where}.ry`),
        rotation: optionalNumber(raw.rotation, `${where}.rotation`) ?? 0,
        largeArc: optionalBoolean(raw.largeArc, `${where}.largeArc`) ?? false,
        sweep: optionalBoolean(raw.sweep, `${where}.sweep`) ?? false,
        to: to(),
      };
    case 'close':
      return { kind: 'close' };
    default:
      throw new RequestValidationError(`${where}.kind '${String(raw.kind)}' is not a known segment kind`);
  }
}

function parseShape(value: unknown, where: string): Shape {
  const raw = requireRecord(value, where);

  switch (raw.type) {
    case 'line':
      return {
        type: 'line',
        start: parsePoint(raw.start, `${where}.start`),
        end: parsePoint(raw.end, `${where}.end`),
      };
    case 'arc':
      return {
        type: 'arc',
        center: parsePoint(raw.center, `${where}.center`),
        radius: requireNumber(raw.radius, `${where}.radius`),
        startAngle: requireNumber(raw.startAngle, `${where}.startAngle`),
        endAngle: requireNumber(raw.endAngle, `${where}.endAngle`),
      };
    case 'circle':
      return {
        type: 'circle',
        center: parsePoint(raw.center, `${where}.center`),
        radius: requireNumber(raw.radius, `${where}.radius`),
      };
    case 'polyline': {
      const shape: PolylineShape = {
        type: 'polyline',
        vertices: requireArray(raw.vertices, `${where}.vertices`).map((vertex, i) =>
          parseVertex(vertex, `${where}.vertices[${i}]`)
        ),
      };
      const closed = optionalBoolean(raw.closed, `${where}.closed`);
      if (closed !== undefined) {
        shape.closed = closed;
      }
      return shape;
    }
    case 'outline':
      return {
        type: 'outline',
        segments: requireArray(raw.segments, `${where}.segments`).map((segment, i) =>
          parseSegment(segment, `${where}.segments[${i}]`)
        ),
      };
    default:
      throw new RequestValidationError(`${where}.type '${String(raw.type)}' is not a known shape type`);
  }
}

function parseItem(value: unknown, index: number): GeometryItem {
  const where = `items[${index}]`;
  const raw = requireRecord(value, where);
  const item: GeometryItem = { shape: parseShape(raw.shape, `${where}.shape`) };

  const id = optionalText(raw.id, `${where}.id`);
  if (id !== undefined) item.id = id;
  const operation = optionalOperation(raw.operation, `${where}.operation`);
  if (operation !== undefined) item.operation = operation;
  const pauseMessage = optionalText(raw.pauseMessage, `${where}.pauseMessage`);
  if (pauseMessage !== undefined) item.pauseMessage = pauseMessage;

  return item;
}

/**
 * Validate an untrusted request body (JSON body or uploaded document).
 */
export function parseConversionRequest(body: unknown): ConversionRequest {
  const raw = requireRecord(body, 'Request body');
  const request: ConversionRequest = {};

  const filename = optionalText(raw.filename, 'filename');
  if (filename !== undefined) {
    if (filename.trim() === '') {
      throw new RequestValidationError('filename must not be empty');
    }
    request.filename = filename;
  }

  const dotSpacing = optionalNumber(raw.dotSpacing, 'dotSpacing');
  if (dotSpacing !== undefined) {
    if (dotSpacing <= 0) {
      throw new RequestValidationError('dotSpacing must be positive');
    }
    request.dotSpacing = dotSpacing;
  }

  if (raw.config !== undefined) {
    request.config = raw.config;
  }

  const hasPaths = raw.paths !== undefined;
  const hasItems = raw.items !== undefined;
  if (hasPaths === hasItems) {
    throw new RequestValidationError('Provide exactly one of paths or items');
  }

  if (hasPaths) {
    request.paths = requireArray(raw.paths, 'paths').map(parsePath);
    if (request.paths.length === 0) {
      throw new RequestValidationError('paths must not be empty');
    }
  } else {
    request.items = requireArray(raw.items, 'items').map(parseItem);
    if (request.items.length === 0) {
      throw new RequestValidationError('items must not be empty');
    }
  }

  return request;
}
