import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { AgentService } from '../services/agent.service';
import { SessionService } from '../services/session.service';
import { NotFoundError } from '../utils/errors';
import { parseInput } from '../utils/validation';

const chatMessageSchema = z.object({
  session_id: z.string().min(1).max(128).optional(),
  message: z.string().trim().min(1).max(5000),
  channel: z.enum(['web', 'sms', 'email', 'api']).default('web'),
});

const sessionParamsSchema = z.object({
  id: z.string().min(1).max(128),
});

export function createChatRouter(agent: AgentService, sessions: SessionService): Router {
  const router = Router();

  router.post('/message', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseInput(chatMessageSchema, req.body);

      const result = await agent.handleMessage({
        session_id: body.session_id ?? uuidv4(),
        message: body.message,
        channel: body.channel,
      });

      res.status(result.retryable ? 503 : 200).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.get('/sessions/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseInput(sessionParamsSchema, req.params);
      const summary = await sessions.summary(id);
      if (!summary) {
        throw new NotFoundError('Session not found');
      }
      res.json({ success: true, session: summary });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/sessions/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseInput(sessionParamsSchema, req.params);
      const ended = await sessions.end(id);
      if (!ended) {
        throw new NotFoundError('Session not found');
      }
      res.json({ success: true, session_id: id });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
