/**
 * Chat endpoint
 * POST /api/chat  { "model": "<name>", "prompt": "<text>" }
 *
 * Dispatch failures come back as reply text with status 200, not as an error
 * envelope: the form shows them in the reply area.
 */

import { Router, Request, Response } from 'express';
import '../types.js';
import { runChat, type ChatBackend } from '../../core/chat.js';
import { isRecord } from '../../core/json.js';

function optionalString(value: unknown): value is string | null | undefined {
  return value === undefined || value === null || typeof value === 'string';
}

export function createChatRouter(backend: ChatBackend): Router {
  const router = Router();

  router.post('/api/chat', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const model = isRecord(body) ? body.model : undefined;
    const prompt = isRecord(body) ? body.prompt : undefined;
    if (!isRecord(body) || !optionalString(model) || !optionalString(prompt)) {
      res.status(400).json({
        success: false,
        error: {
          type: 'invalid_request',
          message: 'Expected a JSON body with optional string fields "model" and "prompt"',
        },
        requestId: req.requestId,
      });
      return;
    }

    const reply = await runChat(backend, model, prompt);
    res.json({ success: true, reply });
  });

  return router;
}
