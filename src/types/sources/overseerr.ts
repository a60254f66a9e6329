/**
 * Overseerr API response shapes
 */

import { z } from 'zod';

const optionalId = z.union([z.number(), z.string()]).nullish();

export const overseerrRequestSchema = z.object({
  id: z.number().int(),
  type: z.string(),
  status: z.number().int(),
  createdAt: z.string(),
  requestedBy: z
    .object({
      displayName: z.string().nullish(),
      username: z.string().nullish(),
      email: z.string().nullish(),
    })
    .nullish(),
  media: z
    .object({
      tmdbId: optionalId,
      tvdbId: optionalId,
      ratingKey: optionalId,
    })
    .nullish(),
});

export const overseerrRequestPageSchema = z.object({
  pageInfo: z.object({
    pages: z.number().int().nonnegative(),
    page: z.number().int(),
    results: z.number().int().nonnegative(),
  }),
  results: z.array(overseerrRequestSchema),
});

export type OverseerrRequest = z.infer<typeof overseerrRequestSchema>;
