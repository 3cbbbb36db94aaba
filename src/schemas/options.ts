import { z } from 'zod';

export const ProviderSettingsSchema = z.object({
  baseURL: z.string().url(),
  apiKey: z.string(),
  timeout: z.number().int().positive(),
  maxAttempts: z.number().int().min(1),
  maxDelay: z.number().int().min(0),
  headers: z.record(z.string()),
});

export const InvokeSettingsSchema = z.object({
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  maxTokens: z.number().int().positive(),
});

export type InvokeSettings = z.infer<typeof InvokeSettingsSchema>;
