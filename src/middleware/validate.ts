import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import { createLogger } from '../services/logger.js';

const logger = createLogger('Validation');

type Source = 'params' | 'query';

const ERROR_LABELS: Record<Source, string> = {
  params: 'Invalid path parameters',
  query: 'Invalid query parameters',
};

/**
 * Parsed values land in res.locals[source]; read them back with
 * parsedParams / parsedQuery.
 */
function validate<T>(source: Source, schema: ZodType<T, ZodTypeDef, unknown>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      res.locals[source] = schema.parse(req[source]);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const issues = error.issues.map(issue => ({
          field: issue.path.join('.'),
          message: issue.message,
        }));
        logger.warn(`${source} validation failed`, { path: req.path, issues });
        res.status(400).json({
          error: ERROR_LABELS[source],
          issues,
        });
        return;
      }
      next(error);
    }
  };
}

export function validateParams<T>(schema: ZodType<T, ZodTypeDef, unknown>): RequestHandler {
  return validate('params', schema);
}

export function validateQuery<T>(schema: ZodType<T, ZodTypeDef, unknown>): RequestHandler {
  return validate('query', schema);
}

export function parsedParams<T>(res: Response, schema: ZodType<T, ZodTypeDef, unknown>): T {
  return schema.parse(res.locals.params);
}

export function parsedQuery<T>(res: Response, schema: ZodType<T, ZodTypeDef, unknown>): T {
  return schema.parse(res.locals.query);
}
