import { z } from 'zod';
import type {
  ActionType,
  MonitorRecord,
  RequestRecord,
  ShowSnapshot,
  WatchRecord,
} from '../types/models.js';

/**
 * Record Validation Schemas
 *
 * Cached payloads are parsed through these before use; a payload that no
 * longer matches is treated as missing and refetched.
 */

const count = z.number().int().nonnegative();

const externalIdsSchema = z.object({
  tvdb: z.string().optional(),
  tmdb: z.string().optional(),
  imdb: z.string().optional(),
});

export const showSnapshotSchema = z.object({
  sourceId: z.string().min(1),
  title: z.string(),
  year: z.number().int().nullable(),
  libraryPath: z.string().nullable(),
  externalIds: externalIdsSchema,
  seasons: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      sourceId: z.string(),
      episodeCount: count,
      viewedEpisodeCount: count,
    })
  ),
  viewedEpisodeCount: count,
  lastViewedAt: z.number().nullable(),
}) satisfies z.ZodType<ShowSnapshot>;

export const watchRecordSchema = z.object({
  canonicalId: z.string(),
  watched: z.boolean(),
  totalPlays: count,
  totalTimeSeconds: z.number().nonnegative(),
  lastWatchedAt: z.number().nullable(),
  granularity: z.enum(['show', 'episode']),
  episodes: z
    .array(z.object({ season: z.number().int(), episode: z.number().int(), plays: count }))
    .optional(),
}) satisfies z.ZodType<WatchRecord>;

export const requestRecordsSchema = z.array(
  z.object({
    canonicalId: z.string(),
    requestId: z.number().int(),
    requestedAt: z.number(),
    requester: z.string().nullable(),
    status: z.string(),
  })
) satisfies z.ZodType<RequestRecord[]>;

export const monitorRecordSchema = z.object({
  canonicalId: z.string(),
  seriesId: z.number().int().nullable(),
  monitored: z.boolean(),
  seasons: z.array(
    z.object({
      season: z.number().int().nonnegative(),
      monitored: z.boolean(),
      episodeFileCount: count,
      episodeCount: count,
    })
  ),
}) satisfies z.ZodType<MonitorRecord>;

export const actionTypeSchema = z.enum([
  'delete',
  'keep_first_season',
  'keep_first_episode',
  'keep',
]) satisfies z.ZodType<ActionType>;
