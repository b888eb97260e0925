// server/src/lib/respond.ts
import { Response } from 'express';
import { z } from 'zod';
import { AppError } from './errors';

export function zodDetails(error: z.ZodError) {
  return error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code,
  }));
}

/**
 * The catch block every route ends with: known errors keep their status,
 * zod failures are 400s with per-field details, anything else is a logged 500.
 */
export function sendError(res: Response, error: unknown, context: string) {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) console.error(`${context} error:`, error);
    return res.status(error.statusCode).json({
      success: false,
      error: error.message,
      details: error.details,
    });
  }

  if (error instanceof z.ZodError) {
    return res.status(400).json({
      success: false,
      error: 'Validation failed',
      details: zodDetails(error),
    });
  }

  console.error(`${context} error:`, error);
  return res.status(500).json({
    success: false,
    error: `${context} failed`,
    details: error instanceof Error ? error.message : 'Unknown error',
  });
}
