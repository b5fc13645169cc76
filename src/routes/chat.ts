/**
 * /api/chat: one conversational turn per request.
 */
import { randomUUID } from 'node:crypto';
import express from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import type { ConversationAgent } from '@/agent/conversation-agent';
import { logger } from '@/services/logger';
import { isAbortError } from '@/utils/abort';
import { createErrorResponse, fieldIssues } from '@/utils/errorResponse';

const chatRequestSchema = z.object({
  conversationId: z.string().min(1).max(128).optional(),
  message: z.string().trim().min(1, 'Please provide a message to process').max(4000),
  mode: z.enum(['auto', 'fact', 'news']).optional().default('auto'),
});

const resetParamsSchema = z.object({
  conversationId: z.string().min(1).max(128),
});

export function createChatRouter(agent: ConversationAgent): express.Router {
  const router = express.Router();

  /**
   * POST /api/chat
   */
  router.post('/', async (req: Request, res: Response) => {
    const validation = chatRequestSchema.safeParse(req.body);
    if (!validation.success) {
      return res
        .status(400)
        .json(createErrorResponse('Invalid request body', fieldIssues(validation.error), 'INVALID_BODY'));
    }

    const body = validation.data;
    const conversationId = body.conversationId ?? randomUUID();

    // a closed connection before the reply is written cancels the turn
    const abortController = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        logger.info('chat:client_disconnected', { conversationId });
        abortController.abort();
      }
    });

    try {
      const response = await agent.handleTurn({
        conversationId,
        message: body.message,
        modeHint: body.mode,
        signal: abortController.signal,
      });
      return res.status(200).json({ conversationId, ...response });
    } catch (err) {
      if (isAbortError(err)) {
        logger.info('chat:turn_aborted', { conversationId });
        if (!res.headersSent && !res.destroyed) {
          return res.status(499).json(createErrorResponse('Request cancelled', undefined, 'CANCELLED'));
        }
        return;
      }

      logger.error('chat:turn_failed', { conversationId, error: err instanceof Error ? err.message : String(err) });
      return res.status(500).json(createErrorResponse('Failed to process the message', undefined, 'TURN_FAILED'));
    }
  });

  /**
   * POST /api/chat/:conversationId/reset
   */
  router.post('/:conversationId/reset', (req: Request, res: Response) => {
    const params = resetParamsSchema.safeParse(req.params);
    if (!params.success) {
      return res
        .status(400)
        .json(createErrorResponse('Invalid conversation id', fieldIssues(params.error), 'INVALID_PARAMS'));
    }

    const cleared = agent.reset(params.data.conversationId);
    if (!cleared) {
      return res.status(404).json(createErrorResponse('Conversation not found', undefined, 'NOT_FOUND'));
    }
    return res.status(200).json({ success: true, conversationId: params.data.conversationId });
  });

  return router;
}
