/**
 * Sonarr API v3 response shapes
 *
 * Series resources are passed through whole: an update PUTs the resource
 * back, so fields this client never reads must survive the round trip.
 */

import { z } from 'zod';

export const sonarrSeasonSchema = z
  .object({
    seasonNumber: z.number().int().nonnegative(),
    monitored: z.boolean(),
    statistics: z
      .object({
        episodeFileCount: z.number().int().nonnegative().default(0),
        episodeCount: z.number().int().nonnegative().default(0),
      })
      .optional(),
  })
  .passthrough();

export const sonarrSeriesSchema = z
  .object({
    id: z.number().int(),
    title: z.string(),
    tvdbId: z.number().int().nullish(),
    monitored: z.boolean(),
    seasons: z.array(sonarrSeasonSchema).default([]),
  })
  .passthrough();

export const sonarrSeriesListSchema = z.array(sonarrSeriesSchema);

export type SonarrSeries = z.infer<typeof sonarrSeriesSchema>;
