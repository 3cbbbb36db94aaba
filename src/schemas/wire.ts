import { z } from 'zod';

export const WireMessageSchema = z.object({
  role: z.string(),
  content: z.string(),
});

const tokenCount = z.number().int().nonnegative().nullish().transform(count => count ?? 0);

// Servers send null as often as they omit a field; both read as zero.
export const WireUsageSchema = z.object({
  prompt_tokens: tokenCount,
  completion_tokens: tokenCount,
  total_tokens: tokenCount,
});

export const ResponseFormatSchema = z.object({
  type: z.literal('json_schema'),
  json_schema: z.object({
    name: z.string(),
    strict: z.boolean(),
    schema: z.record(z.unknown()),
  }),
});

export const ChatCompletionsRequestSchema = z.object({
  model: z.string().min(1),
  messages: z.array(WireMessageSchema).min(1),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
  response_format: ResponseFormatSchema.optional(),
});

export const ChoiceSchema = z.object({
  message: z.object({
    role: z.string().default('assistant'),
    content: z.string().nullish().transform(content => content ?? ''),
    refusal: z.string().nullish(),
  }),
  finish_reason: z.string().nullish(),
  index: z.number().int().nullish().transform(index => index ?? 0),
});

// Providers disagree on the optional fields; only choices and usage matter.
export const ChatCompletionsResponseSchema = z
  .object({
    id: z.string().nullish().transform(id => id ?? ''),
    model: z.string().nullish(),
    object: z.string().nullish(),
    created: z.number().nullish(),
    provider: z.string().nullish(),
    system_fingerprint: z.string().nullish(),
    choices: z.array(ChoiceSchema).nullish().transform(choices => choices ?? []),
    usage: WireUsageSchema.nullish().transform(
      usage => usage ?? { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 }
    ),
  })
  .passthrough();

export type WireMessage = z.infer<typeof WireMessageSchema>;
export type ResponseFormat = z.infer<typeof ResponseFormatSchema>;
export type ChatCompletionsRequest = z.infer<typeof ChatCompletionsRequestSchema>;
export type Choice = z.infer<typeof ChoiceSchema>;
export type ChatCompletionsResponse = z.infer<typeof ChatCompletionsResponseSchema>;
