// Discord's max message length (hard limit is 2000; keep a safe margin)
export const MAX_DISCORD_LEN = 1999 as const;

// Embed field values are capped at 1024 characters
export const MAX_EMBED_FIELD_LEN = 1024 as const;

// ── Emojis (Unicode only)
export const EMOJI_ERROR = '⚠️' as const;
export const EMOJI_FAIL = '‼️' as const;
export const EMOJI_ROOM_RANKINGS = '📊' as const;
export const EMOJI_FIRST_PLACE = '🥇' as const;
export const EMOJI_SECOND_PLACE = '🥈' as const;
export const EMOJI_THIRD_PLACE = '🥉' as const;
export const EMOJI_WIN = '🏆' as const;
export const EMOJI_LOSS = '🤢' as const;

// ── Embed colors
export const MATCH_EMBED_COLOR = 0x9b59b6; // purple
export const LEADERBOARD_EMBED_COLOR = 0x9d7cc4;

// ── Match ids are shown as `<connect code>:<game id>`
export const MATCH_ID_REGEX = /^(?:([A-Z]{6}):)?(\d{1,19})$/i;

export const MENTION_ID_REGEX = /<@!?(\d+)>/;
