import { z } from "zod";

/**
 * Account record owned by the remote quota service. Only `id`, `quota` and `group`
 * are modelled; every other field passes through untouched because the update
 * endpoint replaces the whole record.
 */
export const RemoteAccountSchema = z
  .object({
    id: z.number().int().positive(),
    quota: z.number().int().default(0),
    group: z.string().default("default"),
    username: z.string().optional(),
  })
  .passthrough();

export type RemoteAccount = z.infer<typeof RemoteAccountSchema>;

export const ApiEnvelopeSchema = z.object({
  success: z.boolean(),
  message: z.string().optional(),
  data: z.unknown().optional(),
});
