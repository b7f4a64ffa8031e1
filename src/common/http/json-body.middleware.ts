import * as express from 'express';
import type { NextFunction, Response } from 'express';
import type { ErrorEnvelope, RequestWithId } from '../filters/api-exception.filter';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * express.json with the error envelope. body-parser rejects before Nest routing,
 * so its 400/413 would otherwise reach Express's HTML error page.
 */
export function jsonBodyMiddleware(limitBytes: number) {
  const parse = express.json({ limit: limitBytes });
  return (req: RequestWithId, res: Response, next: NextFunction) => {
    parse(req, res, (err?: unknown) => {
      if (!err) return next();
      const status = isObject(err) && typeof err.status === 'number' ? err.status : 400;
      const tooLarge = status === 413;
      const payload: ErrorEnvelope = {
        meta: {
          status,
          errors: [
            {
              code: status,
              message: tooLarge ? 'Request body too large' : 'Malformed JSON body',
              reason: tooLarge ? 'payload_too_large' : 'body',
            },
          ],
          ...(req.requestId ? { requestId: req.requestId } : {}),
        },
      };
      res.status(status).json(payload);
    });
  };
}
