/**
 * Eligibility Rules
 *
 * Pure decision logic: given a show and its gathered records, decide
 * whether the show may be acted on. A show is eligible only when nothing
 * says it was watched, nobody asked for it recently and no partial
 * protection rule holds.
 */

import type { Show } from '../../types/models.js';
import type { AssessmentOptions, ExclusionReason, ShowAssessment, ShowRecords } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export function isUnwatched(show: Show, records: ShowRecords, options: AssessmentOptions): boolean {
  if (show.viewedEpisodeCount > 0 || show.seasons.some((season) => season.viewedEpisodeCount > 0)) {
    return false;
  }

  const watch = options.skipWatchHistory ? null : records.watch;
  if (!watch) {
    return true;
  }

  // Any play anywhere counts; mixed data is watched
  const episodePlays = watch.episodes?.some((episode) => episode.plays > 0) ?? false;
  return !(watch.watched || watch.totalPlays > 0 || episodePlays);
}

export function isRequestedRecently(records: ShowRecords, options: AssessmentOptions, now: number): boolean {
  if (options.skipRequests) {
    return false;
  }
  const thresholdMs = options.requestThresholdDays * DAY_MS;
  return records.requests.some((request) => now - request.requestedAt < thresholdMs);
}

/**
 * Season numbers with at least one episode on disk, from either the media
 * server or the monitoring service. Specials (season 0) count as content.
 */
export function downloadedSeasons(show: Show, records: ShowRecords): number[] {
  const seasons = new Set<number>();
  for (const season of show.seasons) {
    if (season.episodeCount > 0) {
      seasons.add(season.index);
    }
  }
  for (const season of records.monitor?.seasons ?? []) {
    if (season.episodeFileCount > 0) {
      seasons.add(season.season);
    }
  }
  return [...seasons].sort((a, b) => a - b);
}

function firstSeasonEpisodeCount(show: Show, records: ShowRecords): number {
  const plex = show.seasons.find((season) => season.index === 1)?.episodeCount ?? 0;
  const monitor = records.monitor?.seasons.find((season) => season.season === 1)?.episodeFileCount ?? 0;
  return Math.max(plex, monitor);
}

export function assessShow(
  show: Show,
  records: ShowRecords,
  options: AssessmentOptions,
  now: number
): ShowAssessment {
  const downloaded = downloadedSeasons(show, records);
  const onlyFirstSeason = downloaded.length === 1 && downloaded[0] === 1;
  const onlyFirstEpisode = onlyFirstSeason && firstSeasonEpisodeCount(show, records) === 1;

  const unwatched = isUnwatched(show, records, options);
  const recent = isRequestedRecently(records, options, now);

  const exclusionReasons: ExclusionReason[] = [];
  if (!unwatched) {
    exclusionReasons.push('watched');
  }
  if (recent) {
    exclusionReasons.push('recently_requested');
  }
  if (options.ignoreFirstSeason && onlyFirstSeason) {
    exclusionReasons.push('first_season_only');
  }
  if (options.ignoreFirstEpisode && onlyFirstEpisode) {
    exclusionReasons.push('first_episode_only');
  }

  const hasPartialProtection =
    exclusionReasons.includes('first_season_only') || exclusionReasons.includes('first_episode_only');
  const eligibleForAction = unwatched && !recent && !hasPartialProtection;

  return {
    show,
    records,
    isUnwatched: unwatched,
    isRequestedRecently: recent,
    hasPartialProtection,
    eligibleForAction,
    recommendedAction: eligibleForAction ? options.defaultAction : 'keep',
    exclusionReasons,
    downloadedSeasons: downloaded,
    assessedAt: now,
  };
}
