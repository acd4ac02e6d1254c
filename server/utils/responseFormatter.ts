/**
 * Response Formatter
 * Utility functions for formatting API responses
 */
import type { Response } from "express";

/**
 * Send success response
 */
export function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
  res.status(statusCode).json(data);
}

/**
 * Send error response
 */
export function sendError(res: Response, error: string | Error, statusCode: number = 500): void {
  const errorMessage = error instanceof Error ? error.message : error;
  res.status(statusCode).json({ error: errorMessage });
}

/**
 * Send validation error response
 */
export function sendValidationError(res: Response, error: string): void {
  sendError(res, error, 400);
}

/**
 * Send not found error response
 */
export function sendNotFound(res: Response, error: string = 'Resource not found'): void {
  sendError(res, error, 404);
}
