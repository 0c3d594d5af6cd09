import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import Joi from 'joi';
import logger from '@/config/logger';
import type { AuthUser, UserRole } from '@/types';
import { AuthorizationError, createError } from './errorHandler';

interface TokenClaims {
  sub: string;
  role: UserRole;
  professionalId?: string;
}

/** Width of appointments.patient_id and professionals.user_id. */
export const MAX_SUBJECT_LENGTH = 64;

// Токены выпускает сервис авторизации; здесь только проверяем подпись и состав
const claimsSchema = Joi.object<TokenClaims>({
  sub: Joi.string().max(MAX_SUBJECT_LENGTH).required(),
  role: Joi.string().valid('patient', 'professional', 'admin').required(),
  professionalId: Joi.string().when('role', {
    is: 'professional',
    then: Joi.required(),
    otherwise: Joi.forbidden()
  })
}).unknown(true);

export const authMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const token = req.header('Authorization')?.replace('Bearer ', '');
  const apiKey = req.header('X-API-Key');

  if (!token && !apiKey) {
    next(createError('No authentication provided', 401, 'NO_AUTH'));
    return;
  }

  if (apiKey) {
    const user = authenticateApiKey(apiKey);
    if (user) {
      req.user = user;
      next();
      return;
    }
    logger.warn('API key authentication failed', { path: req.path, ip: req.ip });
  }

  if (token) {
    const user = authenticateJWT(token);
    if (user) {
      req.user = user;
      next();
      return;
    }
    logger.warn('JWT authentication failed', { path: req.path, ip: req.ip });
  }

  next(createError('Invalid authentication credentials', 401, 'INVALID_AUTH'));
};

function authenticateApiKey(apiKey: string): AuthUser | null {
  const expected = process.env.API_KEY;
  if (!expected || apiKey !== expected) {
    return null;
  }
  return { id: 'service', role: 'admin' };
}

export function authenticateJWT(token: string): AuthUser | null {
  const secret = process.env.JWT_SECRET;
  if (!secret) {
    logger.error('JWT_SECRET is not configured');
    return null;
  }

  try {
    const decoded = jwt.verify(token, secret);
    if (typeof decoded === 'string') {
      return null;
    }

    const result = claimsSchema.validate(decoded);
    if (result.error || result.value === undefined) {
      logger.debug('Token claims rejected', { reason: result.error?.message });
      return null;
    }

    const claims = result.value;
    return claims.role === 'professional'
      ? { id: claims.sub, role: claims.role, professionalId: claims.professionalId }
      : { id: claims.sub, role: claims.role };
  } catch (error) {
    logger.debug('JWT verification failed', {
      reason: error instanceof Error ? error.message : String(error)
    });
    return null;
  }
}

export function requireUser(req: Request): AuthUser {
  if (!req.user) {
    throw createError('Authentication required', 401, 'NO_AUTH');
  }
  return req.user;
}

export const requireRole = (...roles: UserRole[]) =>
  (req: Request, res: Response, next: NextFunction): void => {
    const user = req.user;
    if (!user || !roles.includes(user.role)) {
      next(new AuthorizationError());
      return;
    }
    next();
  };

/** Professional-scoped routes: the professional in `:id` or an admin. */
export const requireProfessionalAccess = (req: Request, res: Response, next: NextFunction): void => {
  const user = req.user;
  if (user && (user.role === 'admin' || user.professionalId === req.params.id)) {
    next();
    return;
  }
  next(new AuthorizationError('You can only manage your own availability'));
};
