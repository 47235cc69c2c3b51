import { z } from 'zod';

export const PRIORITIES = ['lowest', 'low', 'normal', 'high', 'emergency'] as const;

export const PrioritySchema = z.enum(PRIORITIES);

export type Priority = z.infer<typeof PrioritySchema>;

/**
 * Relay priorities run from -2 (lowest) to 2 (emergency). Out-of-range values
 * are clamped.
 */
export function priorityFromRelay(value: number): Priority {
  const index = Math.min(Math.max(Math.trunc(value), -2), 2) + 2;
  return PRIORITIES[index] ?? 'normal';
}

const FlagSchema = z.union([z.literal(0), z.literal(1)]);

export const RawMessageSchema = z.object({
  id: z.number().int().min(0),
  id_str: z.string().optional(),
  message: z.string(),
  app: z.string().default(''),
  aid: z.number().int().optional(),
  icon: z.string().optional(),
  date: z.number().int().min(0),
  priority: z.number().int().default(0),
  acked: FlagSchema.default(0),
  umid: z.number().int().optional(),
  title: z.string().nullable().optional(),
  url: z.string().nullable().optional(),
  url_title: z.string().nullable().optional(),
  sound: z.string().nullable().optional(),
  html: FlagSchema.nullable().optional(),
  receipt: z.string().nullable().optional(),
  // Emergency parameters, in seconds, when the relay passes them through.
  // 0 means the relay did not pass one on.
  retry: z.number().int().min(0).nullable().optional(),
  expire: z.number().int().min(0).nullable().optional(),
}).passthrough();

export type RawMessage = z.infer<typeof RawMessageSchema>;

export const MessagesResponseSchema = z.object({
  status: z.number().int(),
  request: z.string().optional(),
  // Items are checked one by one with RawMessageSchema so one bad entry
  // does not sink the batch.
  messages: z.array(z.unknown()).default([]),
}).passthrough();

export type MessagesResponse = z.infer<typeof MessagesResponseSchema>;

export const StatusResponseSchema = z.object({
  status: z.number().int(),
  request: z.string().optional(),
  errors: z.array(z.string()).optional(),
}).passthrough();

export type StatusResponse = z.infer<typeof StatusResponseSchema>;

export const LoginResponseSchema = StatusResponseSchema.extend({
  id: z.string(),
  secret: z.string(),
});

export type LoginResponse = z.infer<typeof LoginResponseSchema>;

export const DeviceRegisterResponseSchema = StatusResponseSchema.extend({
  id: z.string(),
});

export type DeviceRegisterResponse = z.infer<typeof DeviceRegisterResponseSchema>;
