import { Request, Response, NextFunction, RequestHandler } from 'express';
import logger from '@/config/logger';
import type { APIResponse } from '@/types/api';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational = true;
  public readonly details?: unknown;

  constructor(message: string, statusCode: number = 500, code: string = 'INTERNAL_ERROR', details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string = 'You are not allowed to perform this action') {
    super(message, 403, 'FORBIDDEN');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
  }
}

// Конфликты по слоту: клиент должен предложить выбрать другое время
export class SlotUnavailableError extends AppError {
  public readonly timeSlot: string;

  constructor(timeSlot: string, message: string = 'This slot was just taken. Please pick another time.') {
    super(message, 409, 'SLOT_UNAVAILABLE', { timeSlot });
    this.timeSlot = timeSlot;
  }
}

export class SlotAlreadyBookedError extends AppError {
  public readonly timeSlot: string;

  constructor(timeSlot: string) {
    super('This slot was just taken. Please pick another time.', 409, 'SLOT_ALREADY_BOOKED', { timeSlot });
    this.timeSlot = timeSlot;
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string) {
    super(message, 409, 'INVALID_STATE');
  }
}

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const appError = err instanceof AppError ? err : undefined;
  const statusCode = appError?.statusCode ?? 500;
  const code = appError?.code ?? 'INTERNAL_ERROR';

  const meta = {
    statusCode,
    message: err.message,
    code,
    url: req.url,
    method: req.method,
    ip: req.ip,
    stack: process.env.NODE_ENV === 'development' ? err.stack : undefined
  };

  if (statusCode >= 500) {
    logger.error('Error occurred:', meta);
  } else {
    logger.warn('Request rejected:', meta);
  }

  // Не выводим детали внутренних ошибок в продакшене
  const response: APIResponse & { stack?: string } = {
    success: false,
    error: {
      code,
      message: process.env.NODE_ENV === 'production' && statusCode === 500
        ? 'Internal server error'
        : err.message,
      ...(appError?.details !== undefined ? { details: appError.details } : {})
    },
    timestamp: new Date()
  };

  if (process.env.NODE_ENV === 'development') {
    response.stack = err.stack;
  }

  res.status(statusCode).json(response);
};

export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => (req, res, next) => {
  Promise.resolve(fn(req, res, next)).catch(next);
};

export const createError = (
  message: string,
  statusCode: number = 500,
  code?: string
): AppError => new AppError(message, statusCode, code);
