/**
 * Express backend serving generated mesh primitives as OBJ
 */

import express, { Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import type { HandlerResponse } from './handlers';
import { handleCompact, handleGetPrimitive, handleHealth, handleListPrimitives } from './handlers';

const app = express();
const port = Number(process.env.PORT ?? 3001);

// Middleware
app.use(cors());

// Configure multer for file uploads
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 10 * 1024 * 1024, // 10MB limit
  },
});

const send = (res: Response, response: HandlerResponse): void => {
  res.status(response.status);
  if (response.kind === 'json') {
    res.json(response.body);
    return;
  }
  res.set(response.headers ?? {});
  res.send(response.body);
};

// Health check endpoint
app.get('/api/health', (_req: Request, res: Response) => {
  send(res, handleHealth());
});

app.get('/api/primitives', (_req: Request, res: Response) => {
  send(res, handleListPrimitives());
});

app.get('/api/primitives/:name', (req: Request, res: Response) => {
  const response = handleGetPrimitive(req.params.name, req.query);
  console.log(`GET /api/primitives/${req.params.name} -> ${response.status}`);
  send(res, response);
});

// Compact an uploaded OBJ file
app.post('/api/compact', upload.single('file'), (req: Request, res: Response) => {
  const response = handleCompact(req.file?.buffer.toString('utf-8'));
  console.log(`POST /api/compact -> ${response.status}`);
  send(res, response);
});

// Start server
app.listen(port, () => {
  console.log(`Server is running on http://localhost:${port}`);
});
