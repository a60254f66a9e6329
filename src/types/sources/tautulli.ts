/**
 * Tautulli API v2 response shapes. Every command answers inside a
 * `response` envelope with a `result` of "success" or "error".
 */

import { z } from 'zod';

function envelope<T extends z.ZodTypeAny>(data: T) {
  return z.object({
    response: z.object({
      result: z.string(),
      message: z.string().nullish(),
      data,
    }),
  });
}

export const tautulliWatchTimeStatsResponseSchema = envelope(
  z.array(
    z.object({
      query_days: z.number().int(),
      total_plays: z.number().int().nonnegative(),
      total_time: z.number().nonnegative(),
    })
  )
);

export const tautulliHistoryResponseSchema = envelope(
  z.object({
    data: z.array(
      z.object({
        date: z.number(),
        stopped: z.number().nullish(),
        parent_media_index: z.union([z.number(), z.string()]).nullish(),
        media_index: z.union([z.number(), z.string()]).nullish(),
      })
    ),
  })
);
