import { Router, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { upload } from '../config/multer';
import { DEFAULT_CONFIG, ReadonlyWelderConfig, resolveConfig } from '../config/welder.config';
import {
  ConfigError,
  RequestValidationError,
  WeldConversionError,
} from '../errors/conversion.errors';
import { Path } from '../models/geometry.types';
import { ConversionPipeline } from '../services/conversion.service';
import { ConversionRequest, parseConversionRequest } from '../services/geometry-input.service';
import { GeometryService, resolvePathIds } from '../services/geometry.service';
import { MemorySink } from '../services/gcode-sink.service';
import { expandWeldPasses } from '../services/multipass.service';

const geometryService = new GeometryService();

export function statusFor(error: unknown): number {
  if (error instanceof RequestValidationError || error instanceof ConfigError) {
    return 400;
  }
  if (error instanceof WeldConversionError) {
    switch (error.code) {
      case 'filename-too-long':
        return 400;
      case 'malformed-event-sequence':
      case 'degenerate-geometry-exhausted':
        return 422;
      case 'io-failure':
        return 500;
    }
  }
  return 500;
}

function sendError(res: Response, error: unknown, context: string): void {
  const status = statusFor(error);
  const message = error instanceof Error ? error.message : String(error);

  if (status >= 500) {
    console.error(`[GcodeRoutes] ${context} failed:`, error);
  } else {
    console.warn(`[GcodeRoutes] ${context} rejected: ${message}`);
  }

  res.status(status).json({
    error: error instanceof Error ? error.name : 'Error',
    code: error instanceof WeldConversionError ? error.code : undefined,
    message,
  });
}

/**
 * Output name for a request: the given filename (extension appended when
 * missing) or `weld-<8 hex chars>` with the configured extension.
 */
export function resolveOutputName(filename: string | undefined, extension: string): string {
  if (filename === undefined) {
    return `weld-${uuidv4().replace(/-/g, '').slice(0, 8)}${extension}`;
  }
  if (/[\\/]/.test(filename)) {
    throw new RequestValidationError('filename must not contain path separators');
  }
  return filename.toLowerCase().endsWith(extension.toLowerCase()) ? filename : `${filename}${extension}`;
}

interface ResolvedRun {
  config: ReadonlyWelderConfig;
  paths: Path[];
}

function resolveRun(request: ConversionRequest, baseConfig: ReadonlyWelderConfig): ResolvedRun {
  const config = resolveConfig(request.config, baseConfig);
  const dotSpacing = request.dotSpacing ?? config.sequence.dotSpacing;
  const paths: Path[] = request.paths ?? geometryService.buildPaths(request.items ?? [], dotSpacing);
  return { config, paths };
}

function convert(req: Request, res: Response, body: unknown, baseConfig: ReadonlyWelderConfig): void {
  const request = parseConversionRequest(body);
  const { config, paths } = resolveRun(request, baseConfig);
  const outputName = resolveOutputName(request.filename, config.output.extension);

  const sink = new MemorySink(outputName);
  const result = new ConversionPipeline(config).convert(paths, sink);

  console.log(
    `[GcodeRoutes] ${req.path}: ${result.summary.pathsProcessed} paths, ` +
      `${result.summary.pointsProcessed} points -> ${outputName}`
  );

  res.attachment(outputName);
  res.setHeader('Content-Type', 'text/plain; charset=utf-8');
  res.setHeader('X-Paths-Processed', String(result.summary.pathsProcessed));
  res.setHeader('X-Points-Processed', String(result.summary.pointsProcessed));
  res.setHeader('X-Centering-Offset', `${result.offset.dx.toFixed(3)},${result.offset.dy.toFixed(3)}`);
  res.send(sink.contents);
}

function parseUploadedDocument(req: Request): unknown {
  if (!req.file) {
    throw new RequestValidationError("No geometry document uploaded (expected field 'geometry')");
  }

  let document: unknown;
  try {
    document = JSON.parse(req.file.buffer.toString('utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RequestValidationError(`Uploaded document is not valid JSON: ${reason}`);
  }

  // A filename form field wins over the one inside the document
  const filename: unknown = req.body?.filename;
  if (typeof filename === 'string' && filename !== '' && typeof document === 'object' && document !== null) {
    return { ...document, filename };
  }
  return document;
}

export function createGcodeRouter(baseConfig: ReadonlyWelderConfig = DEFAULT_CONFIG): Router {
  const router = Router();

  /**
   * Convert paths or geometry items to a G-code download
   */
  router.post('/convert', (req: Request, res: Response) => {
    try {
      convert(req, res, req.body, baseConfig);
    } catch (error) {
      sendError(res, error, 'Conversion');
    }
  });

  /**
   * Same as /convert, with the request document uploaded as a file
   */
  router.post('/upload', upload.single('geometry'), (req: Request, res: Response) => {
    try {
      convert(req, res, parseUploadedDocument(req), baseConfig);
    } catch (error) {
      sendError(res, error, 'Upload conversion');
    }
  });

  /**
   * Bounds and centering for a pattern without emitting G-code
   */
  router.post('/analyze', (req: Request, res: Response) => {
    try {
      const request = parseConversionRequest(req.body);
      const { config, paths } = resolveRun(request, baseConfig);
      const analysis = new ConversionPipeline(config).analyze(paths);

      res.json({
        ...analysis,
        paths: resolvePathIds(expandWeldPasses(paths, config)).map(p => ({
          id: p.id,
          operation: p.operation,
          pointCount: p.points.length,
          bounds: geometryService.getBoundingBox(p.points),
        })),
      });
    } catch (error) {
      sendError(res, error, 'Analysis');
    }
  });

  return router;
}
