import { Router, Request, Response } from 'express';
import { asyncHandler } from '@/middleware/errorHandler';
import { requireProfessionalAccess, requireRole } from '@/middleware/auth';
import { DateUtils } from '@/middleware/dateUtils';
import {
  validateAppointmentList,
  validateGenerateSlots,
  validateProfessionalParams,
  validateRange,
  validateSlotList,
  validateTimeSlot
} from '@/middleware/validation';
import type { SchedulingServices } from '@/scheduling';
import type {
  AppointmentListQuery,
  CreateRangeDto,
  GenerateSlotsDto,
  SlotListQuery,
  TimeSlotDto
} from '@/types/api';
import { sendSuccess } from './respond';
import { toAppointmentQuery } from './appointments';

export function createProfessionalsRouter(services: SchedulingServices): Router {
  const { ranges, generator, coordinator, queries } = services;
  const router = Router();
  const manage = [validateProfessionalParams, requireProfessionalAccess];

  // Специалисты со свободными слотами
  router.get('/available', asyncHandler(async (req: Request, res: Response) => {
    sendSuccess(res, await queries.professionalsWithAvailability());
  }));

  // Диапазоны доступности
  router.get('/:id/ranges', validateProfessionalParams, asyncHandler(async (req: Request, res: Response) => {
    sendSuccess(res, await ranges.listRanges(req.params.id));
  }));

  router.post('/:id/ranges', ...manage, validateRange, asyncHandler(async (req: Request, res: Response) => {
    const dto: CreateRangeDto = req.body;
    const range = await ranges.addRange(req.params.id, dto);
    sendSuccess(res, range, 201, 'Availability range added');
  }));

  // Маршрут по id объявлен раньше маршрута по индексу
  router.delete('/:id/ranges/id/:rangeId', ...manage, asyncHandler(async (req: Request, res: Response) => {
    await ranges.removeRangeById(req.params.id, req.params.rangeId);
    sendSuccess(res, { rangeId: req.params.rangeId }, 200, 'Availability range removed');
  }));

  router.delete('/:id/ranges/:index', ...manage, asyncHandler(async (req: Request, res: Response) => {
    const removed = await ranges.removeRange(req.params.id, parseInt(req.params.index));
    sendSuccess(res, removed, 200, 'Availability range removed');
  }));

  // Слоты
  router.post('/:id/slots/generate', ...manage, validateGenerateSlots, asyncHandler(async (req: Request, res: Response) => {
    const dto: GenerateSlotsDto = req.body;
    const result = await generator.regenerate(req.params.id, dto);
    sendSuccess(res, result);
  }));

  router.post('/:id/slots/expire', ...manage, asyncHandler(async (req: Request, res: Response) => {
    const expired = await coordinator.expirePastSlots(req.params.id);
    sendSuccess(res, { expired });
  }));

  router.post('/:id/slots', ...manage, validateTimeSlot, asyncHandler(async (req: Request, res: Response) => {
    const { timeSlot }: TimeSlotDto = req.body;
    const added = await coordinator.addManualSlot(req.params.id, timeSlot);
    sendSuccess(res, { timeSlot: DateUtils.normalizeSlot(timeSlot), added }, added ? 201 : 200);
  }));

  router.delete('/:id/slots', ...manage, validateTimeSlot, asyncHandler(async (req: Request, res: Response) => {
    const { timeSlot }: TimeSlotDto = req.body;
    const removed = await coordinator.retractSlot(req.params.id, timeSlot);
    sendSuccess(res, { timeSlot: DateUtils.normalizeSlot(timeSlot), removed });
  }));

  router.get('/:id/slots', validateProfessionalParams, validateSlotList, asyncHandler(async (req: Request, res: Response) => {
    const query: SlotListQuery = res.locals.query;
    const professionalId = req.params.id;

    let slots: string[];
    if (query.date) {
      slots = await queries.slotsForDate(professionalId, query.date);
    } else if (query.from && query.to) {
      slots = await queries.slotsForRange(
        professionalId,
        DateUtils.parseSlot(query.from),
        DateUtils.parseSlot(query.to)
      );
    } else {
      slots = await queries.listSlots(professionalId);
    }

    sendSuccess(res, slots);
  }));

  router.get('/:id/slots/:timeSlot/available', validateProfessionalParams, asyncHandler(async (req: Request, res: Response) => {
    const available = await queries.isSlotAvailable(req.params.id, req.params.timeSlot);
    sendSuccess(res, { timeSlot: req.params.timeSlot, available });
  }));

  // Статистика
  router.get('/:id/availability/stats', validateProfessionalParams, asyncHandler(async (req: Request, res: Response) => {
    sendSuccess(res, await queries.stats(req.params.id));
  }));

  router.get('/:id/availability/next', validateProfessionalParams, asyncHandler(async (req: Request, res: Response) => {
    sendSuccess(res, { nextAvailableSlot: await queries.nextAvailableSlot(req.params.id) });
  }));

  // Записи специалиста
  router.get(
    '/:id/appointments',
    requireRole('professional', 'admin'),
    ...manage,
    validateAppointmentList,
    asyncHandler(async (req: Request, res: Response) => {
      const query: AppointmentListQuery = res.locals.query;
      const appointments = await coordinator.listProfessionalAppointments(req.params.id, toAppointmentQuery(query));
      sendSuccess(res, appointments);
    })
  );

  return router;
}
