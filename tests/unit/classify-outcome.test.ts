import { describe, expect, it } from 'vitest';

import {
  factionRole,
  winCodesForFaction,
  winConditionFromCode,
  winningFactionOf,
} from '../../src/utils/classify-outcome.js';

describe('winConditionFromCode', () => {
  it('maps the known codes', () => {
    expect(winConditionFromCode(0)).toBe('HumansByVote');
    expect(winConditionFromCode(1)).toBe('HumansByTask');
    expect(winConditionFromCode(2)).toBe('ImpostorByVote');
    expect(winConditionFromCode(3)).toBe('ImpostorByKill');
    expect(winConditionFromCode(4)).toBe('ImpostorBySabotage');
    expect(winConditionFromCode(5)).toBe('ImpostorDisconnect');
    expect(winConditionFromCode(6)).toBe('HumansDisconnect');
  });

  it('returns Unknown outside the known range', () => {
    expect(winConditionFromCode(7)).toBe('Unknown');
    expect(winConditionFromCode(-1)).toBe('Unknown');
    expect(winConditionFromCode(1.5)).toBe('Unknown');
  });
});

describe('winningFactionOf', () => {
  it('gives crewmates codes 0, 1 and 6', () => {
    for (const code of [0, 1, 6]) {
      expect(winningFactionOf(winConditionFromCode(code))).toBe('crewmate');
    }
  });

  it('gives imposters codes 2 to 5', () => {
    for (const code of [2, 3, 4, 5]) {
      expect(winningFactionOf(winConditionFromCode(code))).toBe('imposter');
    }
  });

  it('marks an unknown condition as a defaulted crewmate win', () => {
    expect(winningFactionOf('Unknown')).toBe('crewmate-by-default');
    expect(factionRole('crewmate-by-default')).toBe('crewmate');
  });
});

describe('winCodesForFaction', () => {
  it('lists the stored codes per faction', () => {
    expect(winCodesForFaction('crewmate')).toEqual([0, 1, 6]);
    expect(winCodesForFaction('imposter')).toEqual([2, 3, 4, 5]);
  });
});
