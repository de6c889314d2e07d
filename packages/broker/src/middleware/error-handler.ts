/**
 * Error Handling Middleware
 */

import type { NextFunction, Request, Response } from 'express';
import type { Logger } from '@taskmatch/core';
import { ValidationError } from '@taskmatch/sdk';

export function createErrorHandler(logger: Logger) {
  // Express recognizes error handlers by arity, so `next` must stay
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationError) {
      return res.status(400).json({ error: err.code, message: err.message });
    }

    // express.json() parse failures carry a 4xx status
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'INVALID_JSON', message: err.message });
    }

    const message = err instanceof Error ? err.message : String(err);
    logger.error('Request failed', { method: req.method, path: req.path, error: message });
    return res.status(500).json({ error: 'INTERNAL_ERROR', message });
  };
}
