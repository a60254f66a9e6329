/**
 * Action Plans
 *
 * Turns an action into the ordered list of upstream calls that carry it
 * out. Media server removals come first, then the monitoring service step.
 */

import type { ActionType, EpisodeInventory, MonitorRecord, Show } from '../../types/models.js';

export type ActionStep =
  | { kind: 'delete_show'; showId: string }
  | { kind: 'delete_season'; showId: string; season: number }
  | { kind: 'delete_episode'; showId: string; season: number; episode: number }
  | { kind: 'unmonitor_series'; seriesId: number }
  | { kind: 'delete_series'; seriesId: number; deleteFiles: boolean };

export interface ActionPlanOptions {
  /** Remove the series from the monitoring service instead of unmonitoring it */
  deleteSeries: boolean;
  listEpisodes: (showId: string, season: number) => Promise<EpisodeInventory[]>;
}

/**
 * The season a partial action keeps: season 1, or the lowest regular
 * season when there is no season 1. Null when the show has only specials.
 */
export function firstRegularSeason(show: Show): number | null {
  const regular = show.seasons.map((season) => season.index).filter((index) => index >= 1);
  if (regular.includes(1)) {
    return 1;
  }
  return regular.length > 0 ? Math.min(...regular) : null;
}

export async function buildActionPlan(
  show: Show,
  monitor: MonitorRecord | null,
  action: ActionType,
  options: ActionPlanOptions
): Promise<ActionStep[]> {
  if (action === 'keep') {
    return [];
  }

  const steps: ActionStep[] = [];
  const showId = show.sourceId;

  if (action === 'delete') {
    steps.push({ kind: 'delete_show', showId });
  } else {
    const keptSeason = firstRegularSeason(show);
    for (const season of show.seasons) {
      if (season.index !== keptSeason) {
        steps.push({ kind: 'delete_season', showId, season: season.index });
      }
    }

    if (action === 'keep_first_episode' && keptSeason !== null) {
      const episodes = await options.listEpisodes(showId, keptSeason);
      const keptEpisode = Math.min(...episodes.map((episode) => episode.index));
      for (const episode of episodes) {
        if (episode.index !== keptEpisode) {
          steps.push({ kind: 'delete_episode', showId, season: keptSeason, episode: episode.index });
        }
      }
    }
  }

  // Shows the monitoring service does not track have no step there
  const seriesId = monitor?.seriesId ?? null;
  if (seriesId !== null) {
    steps.push(
      action === 'delete' && options.deleteSeries
        ? // The media server removal already took the files
          { kind: 'delete_series', seriesId, deleteFiles: false }
        : { kind: 'unmonitor_series', seriesId }
    );
  }

  return steps;
}

export function describeStep(step: ActionStep): string {
  switch (step.kind) {
    case 'delete_show':
      return `plex: delete show ${step.showId}`;
    case 'delete_season':
      return `plex: delete season ${step.season} of ${step.showId}`;
    case 'delete_episode':
      return `plex: delete S${pad(step.season)}E${pad(step.episode)} of ${step.showId}`;
    case 'unmonitor_series':
      return `sonarr: unmonitor series ${step.seriesId}`;
    case 'delete_series':
      return `sonarr: delete series ${step.seriesId}${step.deleteFiles ? ' with files' : ''}`;
  }
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}
