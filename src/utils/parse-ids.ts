import { MATCH_ID_REGEX, MENTION_ID_REGEX } from '../config/constants.js';

const SNOWFLAKE_RE = /^\d{17,20}$/;

export function parseDiscordUserId(input: string | null | undefined): string | null {
  const raw = (input ?? '').trim();
  if (!raw) return null;

  if (SNOWFLAKE_RE.test(raw)) return raw;

  const m = raw.match(MENTION_ID_REGEX);
  const id = m?.[1];
  if (id && SNOWFLAKE_RE.test(id)) return id;
  return null;
}

export type MatchRef = {
  connectCode: string | null;
  matchId: string;
};

/** Accepts `ABCDEF:1234` (as shown in match embeds) or a bare `1234`. */
export function parseMatchRef(input: string | null | undefined): MatchRef | null {
  const m = (input ?? '').trim().match(MATCH_ID_REGEX);
  const id = m?.[2];
  if (!m || !id) return null;

  // canonical form: no leading zeros
  const matchId = id.replace(/^0+(?=\d)/, '');
  return { connectCode: m[1]?.toUpperCase() ?? null, matchId };
}
