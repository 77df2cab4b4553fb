/**
 * Express app for STL surface analysis
 */

import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { parseSTL } from '../../shared/parsers/stl';
import type { ParseError } from '../../shared/parsers/stl';
import { toReport } from '../../shared/converters/report';
import { parseVec3 } from '../../shared/validators/validators';
import type { ServerConfig } from './config';

const parseErrorBody = (error: ParseError) => ({
  success: false,
  error: {
    message: error.message,
    line: error.line,
  },
});

const field = (body: unknown, name: string): string => {
  if (typeof body !== 'object' || body === null) {
    return '';
  }
  const value: unknown = Reflect.get(body, name);
  return typeof value === 'string' ? value.trim() : '';
};

export const createApp = (config: ServerConfig): express.Application => {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Uploads stay in memory
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: config.uploadLimitBytes,
    },
  });

  // Health check endpoint
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', message: 'STL metadata API is running' });
  });

  // Surface summary for an uploaded STL file
  app.post('/api/analyze/stl', upload.single('file'), (req: Request, res: Response) => {
    if (!req.file) {
      res.status(400).json({ error: 'No file uploaded' });
      return;
    }

    const result = parseSTL(req.file.buffer.toString('utf-8'));
    if (!result.ok) {
      res.status(400).json(parseErrorBody(result.error));
      return;
    }

    res.json({
      success: true,
      data: toReport(result.value),
    });
  });

  // Facets touching one vertex of an uploaded STL file
  app.post('/api/analyze/stl/facets', upload.single('file'), (req: Request, res: Response) => {
    if (!req.file) {
      res.status(400).json({ error: 'No file uploaded' });
      return;
    }

    const vertex = parseVec3(
      ['x', 'y', 'z'].map(name => field(req.body, name)),
      'Vertex'
    );
    if (!vertex.ok) {
      res.status(400).json({ success: false, error: vertex.error });
      return;
    }

    const result = parseSTL(req.file.buffer.toString('utf-8'));
    if (!result.ok) {
      res.status(400).json(parseErrorBody(result.error));
      return;
    }

    res.json({
      success: true,
      data: {
        vertex: vertex.value,
        facets: result.value.findFacets(vertex.value),
      },
    });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error('Error:', err);
    res.status(500).json({
      success: false,
      error: { message: err instanceof Error ? err.message : 'Unknown error' },
    });
  });

  return app;
};
