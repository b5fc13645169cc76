// src/app.ts: express app wiring, separate from listen() so it can be built in-process

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { ConversationAgent } from '@/agent/conversation-agent';
import { createChatRouter } from '@/routes/chat';
import { logger } from '@/services/logger';
import { createErrorResponse } from '@/utils/errorResponse';

export function createApp(agent: ConversationAgent): express.Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: process.env.NODE_ENV,
    });
  });

  app.use('/api/chat', createChatRouter(agent));

  app.use((req: Request, res: Response) => {
    res.status(404).json(createErrorResponse(`Route ${req.method} ${req.path} not found`, undefined, 'NOT_FOUND'));
  });

  // malformed JSON bodies and anything a route let through
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('http:unhandled_error', { error: err instanceof Error ? err.message : String(err) });
    if (err instanceof SyntaxError) {
      res.status(400).json(createErrorResponse('Malformed JSON body', undefined, 'BAD_JSON'));
      return;
    }
    res.status(500).json(createErrorResponse('Internal server error', undefined, 'INTERNAL_ERROR'));
  });

  return app;
}
