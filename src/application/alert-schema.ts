import { z } from 'zod';

/**
 * Zod schema for the alert webhook body.
 *
 * Every field is optional: the relay fills gaps with placeholders.
 * Unknown keys are ignored.
 */
export const alertEventSchema = z.object({
  web_url: z.string().nullish(),
  title: z.string().nullish(),
  user: z.object({ id: z.string().nullish() }).nullish(),
  level: z.string().nullish(),
  platform: z.string().nullish(),
  timestamp: z.number().nullish(),
  project: z.number().int().nonnegative().nullish(),
  logger: z.string().nullish(),
  release: z.string().nullish(),
  culprit: z.string().nullish(),
  tags: z.array(z.tuple([z.string(), z.string()])).nullish(),
});

export const alertWebhookSchema = z.object({
  data: z
    .object({
      event: alertEventSchema.nullish(),
    })
    .nullish(),
});

export type AlertEvent = z.infer<typeof alertEventSchema>;
export type AlertWebhookPayload = z.infer<typeof alertWebhookSchema>;
