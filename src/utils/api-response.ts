import { Response } from 'express';
import { APIResponse } from '../types';
import { isRecord } from './validation';

export function sendSuccess<T>(res: Response, data: T, status = 200): void {
  const body: APIResponse<T> = {
    success: true,
    data,
    timestamp: new Date()
  };
  res.status(status).json(body);
}

export function sendError(res: Response, status: number, error: string, details?: string[]): void {
  const body: APIResponse = {
    success: false,
    error,
    ...(details !== undefined && { details }),
    timestamp: new Date()
  };
  res.status(status).json(body);
}

export interface BodyParseFailure {
  status: number;
  message: string;
}

/**
 * Response for a request body that express.json rejected, null for any other error
 */
export function bodyParseFailure(err: unknown): BodyParseFailure | null {
  if (!isRecord(err)) {
    return null;
  }

  switch (err.type) {
    case 'entity.parse.failed':
      return { status: 400, message: 'Malformed JSON body' };
    case 'entity.too.large':
      return { status: 413, message: 'Request body too large' };
    default:
      return null;
  }
}
