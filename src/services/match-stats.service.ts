import { PgStatsRepository, type StatsRepository } from '../db/stats.repository.js';
import type { MatchRecord, RawEvent, UserOutcomeRecord } from '../types/records.js';
import type { MatchStatistics, TimelineEntryKind } from '../types/stats.js';
import { classifyEvent } from '../utils/classify-event.js';
import { winConditionFromCode, winningFactionOf } from '../utils/classify-outcome.js';

export type ReduceOptions = {
  /** Called for each player-action event whose payload could not be parsed. */
  onMalformed?: (event: RawEvent, error: string) => void;
};

/**
 * Fold one match's telemetry into display statistics.
 *
 * Events must already be in ascending time order; they are not sorted here.
 * A death is always counted, but gets no timeline entry when the player was
 * exiled earlier in the same match (the capture reports exiled players as dead too).
 */
export function reduceMatch(
  match: MatchRecord | null,
  events: readonly RawEvent[],
  outcomes: readonly UserOutcomeRecord[],
  opts: ReduceOptions = {}
): MatchStatistics {
  const winCondition = match ? winConditionFromCode(match.winType) : 'Unknown';

  const stats: MatchStatistics = {
    startTime: match?.startTime ?? 0,
    endTime: match?.endTime ?? 0,
    durationSeconds: match ? match.endTime - match.startTime : 0,
    winCondition,
    winningFaction: winningFactionOf(winCondition),
    winnerNames: [],
    loserNames: [],
    meetings: 0,
    deaths: 0,
    exiles: 0,
    disconnects: 0,
    timeline: [],
  };

  for (const outcome of outcomes) {
    if (outcome.won) stats.winnerNames.push(outcome.playerName);
    else stats.loserNames.push(outcome.playerName);
  }

  if (events.length < 2) return stats;

  const start = match?.startTime ?? 0;
  const exiled = new Set<string>();
  const push = (kind: TimelineEntryKind, event: RawEvent, data: string): void => {
    stats.timeline.push({ kind, offset: event.eventTime - start, data });
  };

  for (const event of events) {
    const classified = classifyEvent(event);

    switch (classified.type) {
      case 'phase-state':
        if (classified.phase === 'discuss') {
          stats.meetings++;
          push('Discuss', event, '');
        } else if (classified.phase === 'tasks') {
          push('Tasks', event, '');
        }
        break;

      case 'player-action':
        if (classified.action === 'died') {
          stats.deaths++;
          if (!exiled.has(classified.name)) push('PlayerDeath', event, classified.payload);
        } else if (classified.action === 'exiled') {
          stats.exiles++;
          exiled.add(classified.name);
          push('PlayerExiled', event, classified.payload);
        } else if (classified.action === 'disconnected') {
          stats.disconnects++;
          push('PlayerDisconnect', event, classified.payload);
        }
        break;

      case 'malformed':
        opts.onMalformed?.(event, classified.error);
        break;

      case 'ignored':
        break;
    }
  }

  return stats;
}

export type MatchReport = {
  match: MatchRecord;
  events: RawEvent[];
  outcomes: UserOutcomeRecord[];
  stats: MatchStatistics;
};

export class MatchStatsService {
  constructor(private readonly repo: StatsRepository = new PgStatsRepository()) {}

  /** Loads and reduces one match; `null` when the match is unknown or the store fails. */
  async getMatchStatistics(matchId: string): Promise<MatchReport | null> {
    try {
      const match = await this.repo.findMatch(matchId);
      if (!match) return null;

      const [events, outcomes] = await Promise.all([
        this.repo.listMatchEvents(matchId),
        this.repo.listMatchOutcomes(matchId),
      ]);

      const stats = reduceMatch(match, events, outcomes, {
        onMalformed: (event, error) => {
          console.warn('Skipping unparsable player event', { matchId, eventId: event.eventId, error });
        },
      });
      return { match, events, outcomes, stats };
    } catch (err) {
      console.error('getMatchStatistics failed', { err, matchId });
      return null;
    }
  }
}
