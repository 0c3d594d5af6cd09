import { Router } from 'express';
import { authMiddleware } from '@/middleware/auth';
import type { SchedulingServices } from '@/scheduling';
import { createAppointmentsRouter } from './appointments';
import { createProfessionalsRouter } from './professionals';

export function createApiRouter(services: SchedulingServices): Router {
  const router = Router();

  // Публичные endpoints (без авторизации)
  router.get('/status', (req, res) => {
    res.json({
      success: true,
      data: {
        service: 'clinic-slots-api',
        version: process.env.npm_package_version || '1.0.0',
        timestamp: new Date().toISOString()
      }
    });
  });

  // Защищенные endpoints
  router.use('/professionals', authMiddleware, createProfessionalsRouter(services));
  router.use('/appointments', authMiddleware, createAppointmentsRouter(services));

  return router;
}
