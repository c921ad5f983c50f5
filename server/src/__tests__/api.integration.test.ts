import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../app';
import { resolveConfig } from '../config/welder.config';
import { resolveOutputName, statusFor } from '../routes/gcode.routes';
import {
  ConfigError,
  DegenerateGeometryError,
  EventSequenceError,
  FilenameTooLongError,
  OutputWriteError,
  RequestValidationError,
} from '../errors/conversion.errors';

const TRIANGLE = {
  id: 'triangle',
  operation: 'normal',
  points: [
    { x: 0, y: 0 },
    { x: 10, y: 0 },
    { x: 10, y: 10 },
  ],
};

describe('API Integration Tests', () => {
  let app: Express;

  beforeAll(() => {
    app = createApp(resolveConfig());
  });

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('GET /api/health', () => {
    it('should report the service as running', async () => {
      const response = await request(app).get('/api/health').expect(200);

      expect(response.body).toEqual({ status: 'ok', message: 'Weld G-code API is running' });
    });
  });

  describe('POST /api/gcode/convert', () => {
    it('should return centered G-code as an attachment', async () => {
      const response = await request(app)
        .post('/api/gcode/convert')
        .send({ filename: 'triangle', paths: [TRIANGLE] })
        .expect(200);

      expect(response.headers['content-type']).toBe('text/plain; charset=utf-8');
      expect(response.headers['content-disposition']).toBe('attachment; filename="triangle.gcode"');
      expect(response.headers['x-paths-processed']).toBe('1');
      expect(response.headers['x-points-processed']).toBe('3');
      expect(response.headers['x-centering-offset']).toBe('120.000,105.000');

      const lines = response.text.split('\n');
      expect(lines).toContain('; Output file: triangle.gcode');
      expect(lines).toContain('G1 X120.000 Y105.000 F3000 ; Move to start of welding');
      expect(lines.filter(line => line.startsWith('G4 '))).toHaveLength(3);
      expect(lines).toContain('G28 X Y ; Home X and Y axes');
    });

    it('should generate a filename when none is given', async () => {
      const response = await request(app)
        .post('/api/gcode/convert')
        .send({ paths: [TRIANGLE] })
        .expect(200);

      expect(response.headers['content-disposition']).toMatch(/^attachment; filename="weld-[0-9a-f]{8}\.gcode"$/);
    });

    it('should vectorize geometry items with the requested dot spacing', async () => {
      const response = await request(app)
        .post('/api/gcode/convert')
        .send({
          filename: 'items.gcode',
          dotSpacing: 2,
          items: [{ id: 'seam', shape: { type: 'line', start: { x: 0, y: 0 }, end: { x: 10, y: 0 } } }],
        })
        .expect(200);

      expect(response.headers['content-disposition']).toBe('attachment; filename="items.gcode"');
      expect(response.headers['x-points-processed']).toBe('6');
      expect(response.text).toContain('; Starting path: seam (normal)\n');
    });

    it('should apply per-request configuration', async () => {
      const response = await request(app)
        .post('/api/gcode/convert')
        .send({
          filename: 'cfg',
          config: { temperatures: { heatingEnabled: false }, normalWelds: { operationDuration: 0.25 } },
          paths: [TRIANGLE],
        })
        .expect(200);

      expect(response.text).not.toContain('M190');
      expect(response.text).toContain('G4 P250 ; Dwell for 0.25s\n');
    });

    it('should reject a filename over the length limit', async () => {
      const response = await request(app)
        .post('/api/gcode/convert')
        .send({ filename: 'an-extremely-long-pattern-name', paths: [TRIANGLE] })
        .expect(400);

      expect(response.body).toEqual({
        error: 'FilenameTooLongError',
        code: 'filename-too-long',
        message:
          "G-code filename 'an-extremely-long-pattern-name.gcode' is 36 characters long, " +
          'which exceeds the 31 character limit (including extension)',
      });
    });

    it('should quote filenames with separators in the download header', async () => {
      const response = await request(app)
        .post('/api/gcode/convert')
        .send({ filename: 'my part; v2', paths: [TRIANGLE] })
        .expect(200);

      expect(response.headers['content-disposition']).toBe('attachment; filename="my part; v2.gcode"');
    });

    it('should encode non-Latin filenames in the download header', async () => {
      const response = await request(app)
        .post('/api/gcode/convert')
        .send({ filename: '焊接', paths: [TRIANGLE] })
        .expect(200);

      expect(response.headers['content-disposition']).toBe(
        "attachment; filename=\"??.gcode\"; filename*=UTF-8''%E7%84%8A%E6%8E%A5.gcode"
      );
      expect(response.text).toContain('; Output file: 焊接.gcode\n');
    });

    it('should reject line breaks in path ids and pause messages', async () => {
      const idResponse = await request(app)
        .post('/api/gcode/convert')
        .send({ paths: [{ ...TRIANGLE, id: 'a\nG1 Z-5 F100' }] })
        .expect(400);
      const messageResponse = await request(app)
        .post('/api/gcode/convert')
        .send({ paths: [{ ...TRIANGLE, operation: 'stop', pauseMessage: 'x\nM104 S300' }] })
        .expect(400);

      expect(idResponse.body).toEqual({
        error: 'RequestValidationError',
        message: 'paths[0].id must not contain control characters',
      });
      expect(messageResponse.body.message).toBe('paths[0].pauseMessage must not contain control characters');
    });

    it('should reject control characters in item ids and the filename', async () => {
      const itemResponse = await request(app)
        .post('/api/gcode/convert')
        .send({ items: [{ id: 'seam\rM0', shape: { type: 'line', start: { x: 0, y: 0 }, end: { x: 10, y: 0 } } }] })
        .expect(400);
      const filenameResponse = await request(app)
        .post('/api/gcode/convert')
        .send({ filename: 'part\nM84', paths: [TRIANGLE] })
        .expect(400);

      expect(itemResponse.body.message).toBe('items[0].id must not contain control characters');
      expect(filenameResponse.body.message).toBe('filename must not contain control characters');
    });

    it('should reject a line break in the operator pause message override', async () => {
      const response = await request(app)
        .post('/api/gcode/convert')
        .send({ config: { sequence: { userPauseMessage: 'Insert\nG1 Z-5' } }, paths: [TRIANGLE] })
        .expect(400);

      expect(response.body).toEqual({
        error: 'ConfigError',
        message: 'sequence.userPauseMessage must not contain control characters',
      });
    });

    it('should reject a body without paths or items', async () => {
      const response = await request(app).post('/api/gcode/convert').send({ filename: 'x' }).expect(400);

      expect(response.body).toEqual({
        error: 'RequestValidationError',
        message: 'Provide exactly one of paths or items',
      });
    });

    it('should reject an invalid operation class', async () => {
      const response = await request(app)
        .post('/api/gcode/convert')
        .send({ paths: [{ ...TRIANGLE, operation: 'laser' }] })
        .expect(400);

      expect(response.body.message).toBe('paths[0].operation must be one of normal, frangible, stop, pipette');
    });

    it('should reject an invalid configuration override', async () => {
      const response = await request(app)
        .post('/api/gcode/convert')
        .send({ config: { movement: { zSpeed: 0 } }, paths: [TRIANGLE] })
        .expect(400);

      expect(response.body).toEqual({
        error: 'ConfigError',
        message: 'movement.xySpeed and movement.zSpeed must be positive',
      });
    });

    it('should answer 422 for geometry that yields no points', async () => {
      const response = await request(app)
        .post('/api/gcode/convert')
        .send({ items: [{ id: 'nothing', shape: { type: 'polyline', vertices: [] } }] })
        .expect(422);

      expect(response.body.code).toBe('degenerate-geometry-exhausted');
    });

    it('should answer 400 for malformed JSON', async () => {
      const response = await request(app)
        .post('/api/gcode/convert')
        .set('Content-Type', 'application/json')
        .send('{ "paths": [')
        .expect(400);

      expect(response.body.error).toBe('Invalid JSON');
    });
  });

  describe('POST /api/gcode/upload', () => {
    it('should convert an uploaded geometry document', async () => {
      const document = Buffer.from(JSON.stringify({ filename: 'inner', paths: [TRIANGLE] }));

      const response = await request(app)
        .post('/api/gcode/upload')
        .field('filename', 'upload')
        .attach('geometry', document, 'pattern.json')
        .expect(200);

      expect(response.headers['content-disposition']).toBe('attachment; filename="upload.gcode"');
      expect(response.headers['x-points-processed']).toBe('3');
    });

    it('should reject a request without a document', async () => {
      const response = await request(app).post('/api/gcode/upload').field('filename', 'upload').expect(400);

      expect(response.body.message).toBe("No geometry document uploaded (expected field 'geometry')");
    });

    it('should reject a document that is not JSON', async () => {
      const response = await request(app)
        .post('/api/gcode/upload')
        .attach('geometry', Buffer.from('{ nope'), 'pattern.json')
        .expect(400);

      expect(response.body.error).toBe('RequestValidationError');
      expect(response.body.message).toMatch(/^Uploaded document is not valid JSON/);
    });

    it('should reject files that are not JSON documents', async () => {
      const response = await request(app)
        .post('/api/gcode/upload')
        .attach('geometry', Buffer.from('G28'), 'pattern.txt')
        .expect(400);

      expect(response.body).toMatchObject({
        error: 'File upload error',
        code: 'LIMIT_UNEXPECTED_FILE',
        field: 'geometry',
      });
    });
  });

  describe('POST /api/gcode/analyze', () => {
    it('should report bounds, centering and per-path extents', async () => {
      const response = await request(app)
        .post('/api/gcode/analyze')
        .send({ paths: [TRIANGLE, { id: 'triangle', operation: 'stop', points: [{ x: 5, y: 40 }] }] })
        .expect(200);

      expect(response.body).toEqual({
        bounds: { minX: 0, minY: 0, maxX: 10, maxY: 40, width: 10, height: 40, hasBounds: true },
        offset: { dx: 120, dy: 90 },
        fitsOnBed: true,
        pathCount: 2,
        pointCount: 4,
        paths: [
          {
            id: 'triangle',
            operation: 'normal',
            pointCount: 3,
            bounds: { minX: 0, minY: 0, maxX: 10, maxY: 10, width: 10, height: 10 },
          },
          {
            id: 'triangle_1',
            operation: 'stop',
            pointCount: 1,
            bounds: { minX: 5, minY: 40, maxX: 5, maxY: 40, width: 0, height: 0 },
          },
        ],
      });
    });
  });
});

describe('gcode route helpers', () => {
  it('should map error kinds to HTTP status codes', () => {
    expect(statusFor(new RequestValidationError('bad'))).toBe(400);
    expect(statusFor(new ConfigError('bad'))).toBe(400);
    expect(statusFor(new FilenameTooLongError('x.gcode', 40, 31))).toBe(400);
    expect(statusFor(new EventSequenceError('bad'))).toBe(422);
    expect(statusFor(new DegenerateGeometryError('bad'))).toBe(422);
    expect(statusFor(new OutputWriteError('disk full'))).toBe(500);
    expect(statusFor(new Error('boom'))).toBe(500);
  });

  it('should append the extension only when missing', () => {
    expect(resolveOutputName('pattern', '.gcode')).toBe('pattern.gcode');
    expect(resolveOutputName('pattern.GCODE', '.gcode')).toBe('pattern.GCODE');
  });

  it('should reject path separators in filenames', () => {
    expect(() => resolveOutputName('../etc/pattern', '.gcode')).toThrow(RequestValidationError);
  });
});
