import type { Response } from 'express';

/**
 * Success envelope. `data` is omitted when there is nothing to return.
 */
export interface SuccessResponse<T> {
  message: string;
  data?: T;
}

export function sendSuccess<T>(res: Response, status: number, message: string, data?: T): void {
  const body: SuccessResponse<T> = data === undefined ? { message } : { message, data };
  res.status(status).json(body);
}
