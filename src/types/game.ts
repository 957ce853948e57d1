// Numeric codes as written by the capture client.

export const EVENT_KIND = {
  connection: 0,
  lobby: 1,
  state: 2,
  player: 3,
  gameOver: 4,
} as const;

export const GAME_PHASE = {
  lobby: 0,
  tasks: 1,
  discuss: 2,
  menu: 3,
  gameOver: 4,
} as const;

export type GamePhase = keyof typeof GAME_PHASE;

export const GAME_PHASES = [
  'lobby',
  'tasks',
  'discuss',
  'menu',
  'gameOver',
] as const satisfies readonly GamePhase[];

export const PLAYER_ACTION = {
  joined: 0,
  left: 1,
  died: 2,
  changeColor: 3,
  forceUpdated: 4,
  disconnected: 5,
  exiled: 6,
} as const;

export type PlayerActionName = keyof typeof PLAYER_ACTION;

export const PLAYER_ACTIONS = [
  'joined',
  'left',
  'died',
  'changeColor',
  'forceUpdated',
  'disconnected',
  'exiled',
] as const satisfies readonly PlayerActionName[];

export const PLAYER_ROLE = {
  crewmate: 0,
  imposter: 1,
} as const;

export type PlayerRole = keyof typeof PLAYER_ROLE;

export function roleFromCode(code: number): PlayerRole {
  return code === PLAYER_ROLE.imposter ? 'imposter' : 'crewmate';
}

// Index is the stored win_type code.
export const WIN_CONDITIONS = [
  'HumansByVote',
  'HumansByTask',
  'ImpostorByVote',
  'ImpostorByKill',
  'ImpostorBySabotage',
  'ImpostorDisconnect',
  'HumansDisconnect',
] as const;

export type WinCondition = (typeof WIN_CONDITIONS)[number] | 'Unknown';

/**
 * `crewmate-by-default` is what an unrecognised win condition resolves to.
 * It displays as a Crewmate win but stays distinguishable from one.
 */
export type WinningFaction = PlayerRole | 'crewmate-by-default';
