/**
 * Model listing endpoint
 * GET /api/models
 */

import { Router, Request, Response } from 'express';
import '../types.js';
import type { ChatBackend } from '../../core/chat.js';
import { errorMessage } from '../../types.js';

export function createModelsRouter(backend: ChatBackend): Router {
  const router = Router();

  router.get('/api/models', async (req: Request, res: Response) => {
    try {
      const models = await backend.listModels();
      res.json({
        success: true,
        models,
        // The form preselects the first model
        selected: models[0] ?? null,
      });
    } catch (err) {
      console.error(`[url-brief] listing ${backend.label} models failed:`, errorMessage(err));
      res.status(502).json({
        success: false,
        models: [],
        selected: null,
        error: {
          type: 'chat_backend_unavailable',
          message: `Could not list ${backend.label} models: ${errorMessage(err)}`,
        },
        requestId: req.requestId,
      });
    }
  });

  return router;
}
