import { z } from 'zod';
import { ValidationError } from './errors';
import { ALERT_FREQUENCIES, filterCriteriaSchema } from './trials/types';
import type { AlertPatch, NewAlertSubscription } from './trials/types';

/**
 * Optional free-text field: trimmed, blank becomes null, absent stays
 * undefined (so a partial update can tell "clear" from "leave alone")
 */
function optionalText(name: string, maxLength: number) {
  return z.string({ invalid_type_error: `${name} must be a string` })
    .trim()
    .max(maxLength, `${name} must be ${maxLength} characters or less`)
    .nullable()
    .optional()
    .transform((value) => (value === undefined ? undefined : value || null));
}

export const saveTrialSchema = z.object({
  notes: optionalText('notes', 2000),
}).strict();

export const expressInterestSchema = z.object({
  message: optionalText('message', 2000),
}).strict();

const alertFields = {
  disease_area: optionalText('disease_area', 255),
  location: optionalText('location', 255),
  phase: optionalText('phase', 50),
  filter_criteria: filterCriteriaSchema.optional(),
  alert_frequency: z.enum(ALERT_FREQUENCIES, {
    errorMap: () => ({ message: `alert_frequency must be one of: ${ALERT_FREQUENCIES.join(', ')}` }),
  }).optional(),
  trial_id: z.string().uuid('trial_id must be a UUID').nullable().optional(),
};

export const createAlertSchema = z.object(alertFields).strict();

export const updateAlertSchema = z.object({
  ...alertFields,
  is_active: z.boolean({ invalid_type_error: 'is_active must be a boolean' }).optional(),
}).strict();

/**
 * Parse with a schema, reporting the first issue as a ValidationError
 */
export function parseWithSchema<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    if (!issue) {
      throw new ValidationError('Invalid request body');
    }
    throw new ValidationError(
      issue.code === z.ZodIssueCode.unrecognized_keys
        ? `Unknown field(s): ${issue.keys.join(', ')}`
        : issue.message
    );
  }
  return result.data;
}

export function parseNewAlert(input: unknown): NewAlertSubscription {
  const data = parseWithSchema(createAlertSchema, input);
  return {
    trialId: data.trial_id ?? null,
    diseaseArea: data.disease_area ?? null,
    location: data.location ?? null,
    phase: data.phase ?? null,
    filterCriteria: data.filter_criteria ?? {},
    frequency: data.alert_frequency ?? 'weekly',
  };
}

/**
 * Only fields present in the body end up defined in the patch
 */
export function parseAlertPatch(input: unknown): AlertPatch {
  const data = parseWithSchema(updateAlertSchema, input);
  return {
    trialId: data.trial_id,
    diseaseArea: data.disease_area,
    location: data.location,
    phase: data.phase,
    filterCriteria: data.filter_criteria,
    frequency: data.alert_frequency,
    isActive: data.is_active,
  };
}
