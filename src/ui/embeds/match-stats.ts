import { EmbedBuilder } from 'discord.js';

import {
  EMOJI_LOSS,
  EMOJI_WIN,
  MATCH_EMBED_COLOR,
  MAX_EMBED_FIELD_LEN,
} from '../../config/constants.js';
import type { WinCondition } from '../../types/game.js';
import type { MatchStatistics, TimelineEntry, TimelineEntryKind } from '../../types/stats.js';
import { parsePlayerActionPayload } from '../../utils/classify-event.js';
import { factionRole } from '../../utils/classify-outcome.js';
import { formatDuration, formatOffset } from '../../utils/format-duration.js';

type BuildMatchStatsEmbedOpts = Readonly<{
  combinedId: string;
  stats: MatchStatistics;
  timeOffsetMinutes: number;
}>;

const DESCRIPTIONS: Record<WinCondition, string> = {
  HumansByTask: '**Crewmates** won by **completing tasks** !',
  HumansByVote: '**Crewmates** won by **voting off the last Imposter** !',
  HumansDisconnect: '**Crewmates** won because **the last Imposter disconnected** !',
  ImpostorDisconnect: '**Imposters** won because **the last Crewmate disconnected** !',
  ImpostorBySabotage: '**Imposters** won by **sabotage** !',
  ImpostorByVote: '**Imposters** won by **voting off the last Crewmate** !',
  ImpostorByKill: '**Imposters** won by **killing the last Crewmate** !',
  Unknown: '',
};

const EVENT_LABELS: Record<TimelineEntryKind, string> = {
  Tasks: '🔨 Task',
  Discuss: '💬 Discussion',
  PlayerDeath: '🔪 **{name}** Killed',
  PlayerDisconnect: '🔌 **{name}** Disconnected',
  PlayerExiled: '⛔ **{name}** Exiled',
};

// Discord rejects empty field values.
const NO_NAMES = '—';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function fmtClock(unixSeconds: number, offsetMinutes: number, withDate: boolean): string {
  const d = new Date((unixSeconds + offsetMinutes * 60) * 1000);
  const h24 = d.getUTCHours();
  const h12 = h24 % 12 === 0 ? 12 : h24 % 12;
  const time = `${h12}:${String(d.getUTCMinutes()).padStart(2, '0')} ${h24 < 12 ? 'AM' : 'PM'}`;
  return withDate ? `${MONTHS[d.getUTCMonth()]} ${d.getUTCDate()}, ${time}` : time;
}

/** One line per timeline entry; player entries whose payload cannot be read are left out. */
export function formatTimelineLine(entry: TimelineEntry): string | null {
  const label = EVENT_LABELS[entry.kind];
  let text = label;

  if (label.includes('{name}')) {
    const parsed = parsePlayerActionPayload(entry.data);
    if (!parsed.ok) return null;
    text = label.replace('{name}', parsed.value.Name);
  }

  return `\`${formatOffset(entry.offset)}\` ${text}`;
}

function joinWithinLimit(lines: readonly string[], limit: number): string {
  let out = '';
  for (const line of lines) {
    const next = out ? `${out}\n${line}` : line;
    if (next.length > limit - 2) return `${out}\n…`;
    out = next;
  }
  return out;
}

export function buildMatchStatsEmbed(opts: BuildMatchStatsEmbedOpts): EmbedBuilder {
  const { stats } = opts;
  const winSide = factionRole(stats.winningFaction) === 'imposter' ? 'Imposters' : 'Crewmates';
  const loseSide = winSide === 'Imposters' ? 'Crewmates' : 'Imposters';

  const embed = new EmbedBuilder()
    .setTitle(`Game \`${opts.combinedId}\``)
    .setColor(MATCH_EMBED_COLOR);

  const description = DESCRIPTIONS[stats.winCondition];
  if (description) embed.setDescription(description);

  if (stats.winnerNames.length > 0) {
    embed.addFields({
      name: `${EMOJI_WIN} ${winSide} (${stats.winnerNames.length})`,
      value: stats.winnerNames.join(', ') || NO_NAMES,
      inline: false,
    });
  }
  if (stats.loserNames.length > 0) {
    embed.addFields({
      name: `${EMOJI_LOSS} ${loseSide} (${stats.loserNames.length})`,
      value: stats.loserNames.join(', ') || NO_NAMES,
      inline: false,
    });
  }

  embed.addFields(
    { name: '🕑 Start', value: fmtClock(stats.startTime, opts.timeOffsetMinutes, true), inline: true },
    { name: '🕑 End', value: fmtClock(stats.endTime, opts.timeOffsetMinutes, false), inline: true },
    { name: '⏲️ Duration', value: formatDuration(stats.durationSeconds), inline: true },
    {
      name: '🎮 Players',
      value: String(stats.winnerNames.length + stats.loserNames.length),
      inline: true,
    },
    { name: '💬 Meetings', value: String(stats.meetings), inline: true },
    {
      name: '☠️ Death',
      value: `${stats.deaths} (${stats.deaths - stats.exiles} killed, ${stats.exiles} exiled)`,
      inline: true,
    }
  );

  const lines = stats.timeline
    .map(formatTimelineLine)
    .filter((line): line is string => line !== null);
  if (lines.length > 0) {
    embed.addFields({
      name: '📋 Game Events',
      value: joinWithinLimit(lines, MAX_EMBED_FIELD_LEN),
      inline: false,
    });
  }

  return embed;
}
