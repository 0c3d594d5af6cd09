import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { ValidationError } from './errorHandler';
import { DateUtils } from './dateUtils';
import { MAX_INTERVAL_MINUTES, MIN_INTERVAL_MINUTES } from '@/scheduling/AvailabilityRangeStore';
import { APPOINTMENT_STATUSES } from '@/types';

const TIME = /^([01]\d|2[0-3]):[0-5]\d$/;
const TIME_SLOT = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2})?$/;
const DATE = /^\d{4}-\d{2}-\d{2}$/;

// Шаблон пропускает 2024-02-30 и 24:00, поэтому проверяем ещё и календарь
const timeSlot = Joi.string()
  .pattern(TIME_SLOT)
  .custom((value: string, helpers) => (DateUtils.isValidSlot(value) ? value : helpers.error('slot.calendar')))
  .messages({
    'string.pattern.base': '{{#label}} must look like YYYY-MM-DDTHH:mm:ss',
    'slot.calendar': '{{#label}} is not a real calendar date and time'
  });

const date = Joi.string()
  .pattern(DATE)
  .custom((value: string, helpers) => (DateUtils.isValidDate(value) ? value : helpers.error('date.calendar')))
  .messages({
    'string.pattern.base': '{{#label}} must be YYYY-MM-DD',
    'date.calendar': '{{#label}} is not a real calendar date'
  });

// Схемы валидации
const rangeSchema = Joi.object({
  dayOfWeek: Joi.number().integer().min(1).max(7).required(),
  startTime: Joi.string().pattern(TIME).required()
    .messages({ 'string.pattern.base': '{{#label}} must be HH:MM' }),
  endTime: Joi.string().pattern(TIME).required()
    .messages({ 'string.pattern.base': '{{#label}} must be HH:MM' }),
  intervalMinutes: Joi.number().integer().min(MIN_INTERVAL_MINUTES).max(MAX_INTERVAL_MINUTES).required()
});

const generateSlotsSchema = Joi.object({
  strategy: Joi.string().valid('additive', 'replace').default('additive'),
  windowDays: Joi.number().integer().min(0).max(180).optional()
});

const timeSlotSchema = Joi.object({
  timeSlot: timeSlot.required()
});

const appointmentSchema = Joi.object({
  professionalId: Joi.string().uuid().required(),
  timeSlot: timeSlot.required(),
  reason: Joi.string().max(500).optional()
});

const updateAppointmentSchema = Joi.object({
  timeSlot: timeSlot.required(),
  reason: Joi.string().max(500).optional()
});

const appointmentListSchema = Joi.object({
  status: Joi.string().valid(...APPOINTMENT_STATUSES).optional(),
  from: timeSlot.optional(),
  to: timeSlot.optional(),
  upcoming: Joi.boolean().optional()
});

const slotListSchema = Joi.object({
  date: date.optional(),
  from: timeSlot.optional(),
  to: timeSlot.optional()
}).and('from', 'to').oxor('date', 'from');

const professionalParamsSchema = Joi.object({
  id: Joi.string().uuid().required(),
  index: Joi.number().integer().min(0),
  rangeId: Joi.string().uuid(),
  timeSlot
});

const appointmentParamsSchema = Joi.object({
  id: Joi.string().uuid().required()
});

type Source = 'body' | 'query' | 'params';

export const validateRange = createValidator(rangeSchema);
export const validateGenerateSlots = createValidator(generateSlotsSchema);
export const validateTimeSlot = createValidator(timeSlotSchema);
export const validateAppointment = createValidator(appointmentSchema);
export const validateAppointmentUpdate = createValidator(updateAppointmentSchema);
export const validateAppointmentList = createValidator(appointmentListSchema, 'query');
export const validateSlotList = createValidator(slotListSchema, 'query');
export const validateProfessionalParams = createValidator(professionalParamsSchema, 'params');
export const validateAppointmentParams = createValidator(appointmentParamsSchema, 'params');

export function createValidator(schema: Joi.ObjectSchema, source: Source = 'body') {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { error, value } = schema.validate(req[source] ?? {}, {
      abortEarly: false,
      stripUnknown: source !== 'params',
      convert: true
    });

    if (error) {
      const details = error.details.map(detail => ({
        field: detail.path.join('.'),
        message: detail.message,
        value: detail.context?.value
      }));

      next(new ValidationError('Validation failed', details));
      return;
    }

    // Приведённые значения query кладём в res.locals: req.query в Express только для чтения строк
    if (source === 'body') {
      req.body = value;
    } else if (source === 'query') {
      res.locals.query = value;
    }
    next();
  };
}
