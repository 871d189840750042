import { z } from 'zod';
import { ValidationError } from './errors';

export const MIN_ID_LENGTH = 5;
export const MAX_PROPERTY_DEPTH = 40;

export function objectDepth(value: unknown): number {
  if (typeof value !== 'object' || value === null) return 0;
  let deepest = 0;
  for (const child of Object.values(value)) {
    deepest = Math.max(deepest, objectDepth(child));
  }
  return deepest + 1;
}

const propertyMap = z
  .record(z.unknown())
  .refine(value => objectDepth(value) <= MAX_PROPERTY_DEPTH, {
    message: `must not be nested more than ${MAX_PROPERTY_DEPTH} levels deep`,
  });

const identity = z.string().min(MIN_ID_LENGTH, {
  message: `must be at least ${MIN_ID_LENGTH} characters`,
});

export const eventSchema = z
  .object({
    event_type: z.string().min(1),
    user_id: identity.optional(),
    device_id: identity.optional(),
    time: z.number().int().nonnegative().optional(),
    event_properties: propertyMap.optional(),
    user_properties: propertyMap.optional(),
  })
  .passthrough()
  .refine(event => event.user_id !== undefined || event.device_id !== undefined, {
    message: 'user_id or device_id is required',
    path: ['user_id'],
  });

export function validateEvents(events: readonly unknown[]): void {
  events.forEach((event, index) => {
    const result = eventSchema.safeParse(event);
    if (!result.success) {
      const issues = result.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      throw new ValidationError(`Invalid event at index ${index}: ${issues[0].path} ${issues[0].message}`, {
        index,
        field: issues[0].path,
        issues,
        suggestion: 'Each event needs event_type and a user_id or device_id of at least 5 characters',
      });
    }
  });
}

export const ingestResponseSchema = z
  .object({
    code: z.number().optional(),
    events_ingested: z.number(),
    payload_size_bytes: z.number().optional(),
    server_upload_time: z.number().optional(),
  })
  .passthrough();

export const userProfileResponseSchema = z
  .object({
    userData: z.record(z.unknown()).nullable().optional(),
  })
  .passthrough();
