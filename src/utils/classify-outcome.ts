import { WIN_CONDITIONS, type PlayerRole, type WinCondition, type WinningFaction } from '../types/game.js';

const IMPOSTER_WINS: ReadonlySet<WinCondition> = new Set([
  'ImpostorDisconnect',
  'ImpostorBySabotage',
  'ImpostorByVote',
  'ImpostorByKill',
]);

export function winConditionFromCode(code: number): WinCondition {
  if (!Number.isInteger(code) || code < 0 || code >= WIN_CONDITIONS.length) return 'Unknown';
  return WIN_CONDITIONS[code] ?? 'Unknown';
}

export function winningFactionOf(condition: WinCondition): WinningFaction {
  if (condition === 'Unknown') return 'crewmate-by-default';
  return IMPOSTER_WINS.has(condition) ? 'imposter' : 'crewmate';
}

/** Side to display for a winning faction. */
export function factionRole(faction: WinningFaction): PlayerRole {
  return faction === 'imposter' ? 'imposter' : 'crewmate';
}

export function winCodesForFaction(role: PlayerRole): number[] {
  const codes: number[] = [];
  WIN_CONDITIONS.forEach((condition, code) => {
    if (winningFactionOf(condition) === role) codes.push(code);
  });
  return codes;
}
