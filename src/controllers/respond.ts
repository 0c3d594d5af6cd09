import { Response } from 'express';
import type { APIResponse } from '@/types/api';

export function sendSuccess<T>(res: Response, data: T, statusCode: number = 200, message?: string): void {
  const response: APIResponse<T> = {
    success: true,
    data,
    ...(message ? { message } : {}),
    timestamp: new Date()
  };
  res.status(statusCode).json(response);
}
