import { z } from 'zod';
import { ROLES } from '../conversation/role.js';
import { WireUsageSchema } from './wire.js';

// Content is checked before role, so an empty message reports content.
export const MessageSchema = z.object({
  content: z.string().min(1, 'cannot be empty'),
  role: z.enum(ROLES, { errorMap: () => ({ message: 'invalid role type' }) }),
});

// What Message#toJSON produces; roles are checked later by validate().
export const SerializedMessageSchema = z.object({
  role: z.string(),
  content: z.string(),
  usage: WireUsageSchema.optional(),
});

export const SerializedTemplateSchema = z.array(SerializedMessageSchema);

export type SerializedMessage = z.infer<typeof SerializedMessageSchema>;
