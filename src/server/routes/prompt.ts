/**
 * Prompt generation endpoint
 * POST /api/prompt  { "url": "<reddit or youtube url>" }
 */

import { Router, Request, Response } from 'express';
import '../types.js';
import { isRecord } from '../../core/json.js';
import { generatePrompt, statusForError, successStatus } from '../../core/pipeline.js';
import type { SourceRegistry } from '../../core/sources.js';
import {
  ExtractionError,
  FetchError,
  MissingInputError,
  UnsupportedSourceError,
  UrlBriefError,
  errorMessage,
} from '../../types.js';

function httpStatusFor(err: unknown): number {
  if (err instanceof MissingInputError || err instanceof UnsupportedSourceError) return 400;
  if (err instanceof ExtractionError) return 422;
  if (err instanceof FetchError) return 502;
  return 500;
}

function errorTypeFor(err: unknown): string {
  return err instanceof UrlBriefError && err.code ? err.code.toLowerCase() : 'internal_error';
}

export function createPromptRouter(sources: SourceRegistry): Router {
  const router = Router();

  /**
   * Responds 200 with { success, source, prompt, status } or an error status
   * with { success: false, prompt: '', status, error }. `status` is the banner
   * the form displays either way.
   */
  router.post('/api/prompt', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const rawUrl = isRecord(body) ? body.url : undefined;

    if (rawUrl !== undefined && rawUrl !== null && typeof rawUrl !== 'string') {
      res.status(400).json({
        success: false,
        error: {
          type: 'invalid_request',
          message: '"url" must be a string',
        },
        requestId: req.requestId,
      });
      return;
    }

    const url = typeof rawUrl === 'string' ? rawUrl : undefined;

    try {
      const outcome = await generatePrompt(url, sources);
      console.log(`[url-brief] ${outcome.source} prompt generated (${outcome.prompt.length} chars) for ${url}`);
      res.json({
        success: true,
        source: outcome.source,
        prompt: outcome.prompt,
        status: successStatus(outcome),
      });
    } catch (err) {
      const httpStatus = httpStatusFor(err);
      if (httpStatus >= 500) {
        console.error(`[url-brief] prompt generation failed for ${url}:`, err);
      }
      res.status(httpStatus).json({
        success: false,
        prompt: '',
        status: statusForError(err),
        error: {
          type: errorTypeFor(err),
          message: errorMessage(err),
        },
        requestId: req.requestId,
      });
    }
  });

  return router;
}
