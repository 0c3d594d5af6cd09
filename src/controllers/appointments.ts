import { Router, Request, Response } from 'express';
import { AuthorizationError, asyncHandler } from '@/middleware/errorHandler';
import { requireRole, requireUser } from '@/middleware/auth';
import { DateUtils } from '@/middleware/dateUtils';
import {
  validateAppointment,
  validateAppointmentList,
  validateAppointmentParams,
  validateAppointmentUpdate
} from '@/middleware/validation';
import type { AppointmentQuery, SchedulingServices } from '@/scheduling';
import type { Appointment, AuthUser } from '@/types';
import type { AppointmentListQuery, CreateAppointmentDto, UpdateAppointmentDto } from '@/types/api';
import { sendSuccess } from './respond';

export function toAppointmentQuery(query: AppointmentListQuery): AppointmentQuery {
  return {
    status: query.status,
    from: query.from ? DateUtils.parseSlot(query.from) : undefined,
    to: query.to ? DateUtils.parseSlot(query.to) : undefined,
    upcoming: query.upcoming
  };
}

function canView(user: AuthUser, appointment: Appointment): boolean {
  return user.role === 'admin'
    || appointment.patientId === user.id
    || (user.professionalId !== undefined && appointment.professionalId === user.professionalId);
}

export function createAppointmentsRouter(services: SchedulingServices): Router {
  const { coordinator } = services;
  const router = Router();

  // Записи текущего пользователя
  router.get('/', validateAppointmentList, asyncHandler(async (req: Request, res: Response) => {
    const user = requireUser(req);
    const query = toAppointmentQuery(res.locals.query);

    if (user.role === 'patient') {
      sendSuccess(res, await coordinator.listPatientAppointments(user.id, query));
      return;
    }
    if (user.role === 'professional' && user.professionalId) {
      sendSuccess(res, await coordinator.listProfessionalAppointments(user.professionalId, query));
      return;
    }
    throw new AuthorizationError('Use /professionals/:id/appointments to list a professional\'s appointments');
  }));

  router.get('/:id', validateAppointmentParams, asyncHandler(async (req: Request, res: Response) => {
    const user = requireUser(req);
    const appointment = await coordinator.getAppointment(req.params.id);

    if (!canView(user, appointment)) {
      throw new AuthorizationError('You are not authorized to view this appointment');
    }
    sendSuccess(res, appointment);
  }));

  // Создать новую запись
  router.post('/', requireRole('patient'), validateAppointment, asyncHandler(async (req: Request, res: Response) => {
    const user = requireUser(req);
    const dto: CreateAppointmentDto = req.body;

    const appointment = await coordinator.bookAppointment(user.id, dto.professionalId, dto.timeSlot, dto.reason);
    sendSuccess(res, appointment, 201, 'Appointment booked');
  }));

  // Перенос и изменение причины
  router.put('/:id', validateAppointmentParams, validateAppointmentUpdate, asyncHandler(async (req: Request, res: Response) => {
    const user = requireUser(req);
    const dto: UpdateAppointmentDto = req.body;

    const appointment = await coordinator.updateAppointment(req.params.id, dto.timeSlot, dto.reason, user.id);
    sendSuccess(res, appointment, 200, 'Appointment updated');
  }));

  router.post('/:id/cancel', validateAppointmentParams, asyncHandler(async (req: Request, res: Response) => {
    const user = requireUser(req);
    const appointment = await coordinator.cancelAppointment(req.params.id, user.id);
    sendSuccess(res, appointment, 200, 'Appointment cancelled');
  }));

  router.post('/:id/confirm', requireRole('professional'), validateAppointmentParams, asyncHandler(async (req: Request, res: Response) => {
    const user = requireUser(req);
    const appointment = await coordinator.confirmAppointment(req.params.id, user.professionalId ?? '');
    sendSuccess(res, appointment, 200, 'Appointment confirmed');
  }));

  router.post('/:id/complete', requireRole('professional'), validateAppointmentParams, asyncHandler(async (req: Request, res: Response) => {
    const user = requireUser(req);
    const appointment = await coordinator.completeAppointment(req.params.id, user.professionalId ?? '');
    sendSuccess(res, appointment, 200, 'Appointment completed');
  }));

  return router;
}
