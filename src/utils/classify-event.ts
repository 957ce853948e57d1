import { z } from 'zod';

import {
  EVENT_KIND,
  GAME_PHASE,
  GAME_PHASES,
  PLAYER_ACTION,
  PLAYER_ACTIONS,
  type GamePhase,
  type PlayerActionName,
} from '../types/game.js';
import type { RawEvent } from '../types/records.js';

// Keys match case-insensitively and missing or null fields take their zero
// value, like the capture client's own decoder. A JSON `null` body decodes to
// all zero values.
function lowerCaseKeys(value: unknown): unknown {
  if (value === null) return {};
  if (typeof value !== 'object' || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).map(([key, v]) => [key.toLowerCase(), v]));
}

const payloadFields = z.object({
  action: z.number().int().nullish(),
  name: z.string().nullish(),
  color: z.number().int().nullish(),
  isdead: z.boolean().nullish(),
  disconnected: z.boolean().nullish(),
});

export const playerActionPayloadSchema = z.preprocess(lowerCaseKeys, payloadFields).transform((p) => ({
  Action: p.action ?? 0,
  Name: p.name ?? '',
  Color: p.color ?? 0,
  IsDead: p.isdead ?? false,
  Disconnected: p.disconnected ?? false,
}));

export type PlayerActionPayload = z.output<typeof playerActionPayloadSchema>;

export type ClassifiedEvent =
  | { type: 'phase-state'; code: string; phase: GamePhase | null }
  | {
      type: 'player-action';
      action: PlayerActionName | null;
      name: string;
      payload: string;
    }
  | { type: 'malformed'; error: string }
  | { type: 'ignored' };

const PHASES_BY_CODE = new Map<string, GamePhase>(
  GAME_PHASES.map((phase) => [String(GAME_PHASE[phase]), phase])
);

const ACTIONS_BY_CODE = new Map<number, PlayerActionName>(
  PLAYER_ACTIONS.map((action) => [PLAYER_ACTION[action], action])
);

export function parsePlayerActionPayload(
  payload: string
): { ok: true; value: PlayerActionPayload } | { ok: false; error: string } {
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }

  const parsed = playerActionPayloadSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => i.message).join('; ') };
  }
  return { ok: true, value: parsed.data };
}

export function classifyEvent(event: Pick<RawEvent, 'eventType' | 'payload'>): ClassifiedEvent {
  if (event.eventType === EVENT_KIND.state) {
    const code = event.payload;
    return { type: 'phase-state', code, phase: PHASES_BY_CODE.get(code) ?? null };
  }

  if (event.eventType === EVENT_KIND.player) {
    const parsed = parsePlayerActionPayload(event.payload);
    if (!parsed.ok) return { type: 'malformed', error: parsed.error };
    return {
      type: 'player-action',
      action: ACTIONS_BY_CODE.get(parsed.value.Action) ?? null,
      name: parsed.value.Name,
      payload: event.payload,
    };
  }

  return { type: 'ignored' };
}
