import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { DEFAULT_CONFIG, ReadonlyWelderConfig } from './config/welder.config';
import { createGcodeRouter } from './routes/gcode.routes';

/**
 * Assemble the HTTP app. Kept apart from `index.ts` so tests can mount it
 * without binding a port.
 */
export function createApp(config: ReadonlyWelderConfig = DEFAULT_CONFIG): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '10mb' }));

  // Routes
  app.use('/api/gcode', createGcodeRouter(config));

  // Health check
  app.get('/api/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', message: 'Weld G-code API is running' });
  });

  // Error handling middleware
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }

    // Handle Multer errors specifically
    if (err instanceof multer.MulterError) {
      console.error('[Upload] Multer error:', err.code, 'field:', err.field, 'path:', req.path);

      return res.status(400).json({
        error: 'File upload error',
        message: err.message,
        code: err.code,
        field: err.field,
      });
    }

    // Malformed JSON bodies from express.json()
    if (err instanceof SyntaxError) {
      return res.status(400).json({
        error: 'Invalid JSON',
        message: err.message,
      });
    }

    console.error('Error occurred:', err);
    res.status(500).json({
      error: 'Internal Server Error',
      message: err instanceof Error ? err.message : String(err),
    });
  });

  return app;
}
