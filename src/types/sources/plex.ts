/**
 * Plex Media Server API response shapes
 *
 * Only the fields the client reads are declared; unknown keys are stripped.
 */

import { z } from 'zod';

const ratingKey = z.union([z.string(), z.number()]).transform(String);

export const plexSectionsResponseSchema = z.object({
  MediaContainer: z.object({
    Directory: z
      .array(
        z.object({
          key: ratingKey,
          title: z.string(),
          type: z.string(),
        })
      )
      .default([]),
  }),
});

export const plexShowSchema = z.object({
  ratingKey,
  title: z.string(),
  year: z.number().int().optional(),
  guid: z.string().optional(),
  Guid: z.array(z.object({ id: z.string() })).default([]),
  Location: z.array(z.object({ path: z.string() })).default([]),
  viewedLeafCount: z.number().int().nonnegative().default(0),
  lastViewedAt: z.number().optional(),
});

export const plexSeasonSchema = z.object({
  ratingKey,
  parentRatingKey: ratingKey.optional(),
  index: z.number().int().nonnegative(),
  leafCount: z.number().int().nonnegative().default(0),
  viewedLeafCount: z.number().int().nonnegative().default(0),
});

export const plexEpisodeSchema = z.object({
  ratingKey,
  index: z.number().int().nonnegative(),
  parentIndex: z.number().int().nonnegative().optional(),
});

function metadataResponse<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    MediaContainer: z.object({
      Metadata: z.array(item).default([]),
    }),
  });
}

export const plexShowsResponseSchema = metadataResponse(plexShowSchema);
export const plexSeasonsResponseSchema = metadataResponse(plexSeasonSchema);
export const plexEpisodesResponseSchema = metadataResponse(plexEpisodeSchema);

export type PlexShow = z.infer<typeof plexShowSchema>;
export type PlexSeason = z.infer<typeof plexSeasonSchema>;
export type PlexEpisode = z.infer<typeof plexEpisodeSchema>;
