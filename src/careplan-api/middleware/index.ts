import type { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import type { ZodIssue } from 'zod';
import { IntakeContractError } from '@core/errors';

export const requestLogger = morgan('dev');

export function formatIssues(issues: readonly ZodIssue[]): string {
  return issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}

export function statusFor(err: Error): number {
  return err instanceof IntakeContractError ? 400 : 500;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  const status = statusFor(err);
  console.error('[ERROR]', err.message);
  res.status(status).json({ success: false, error: err.message });
}

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/** Forward async handler rejections to the error middleware. */
export function asyncHandler(handler: AsyncRoute) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
