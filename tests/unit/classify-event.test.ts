import { describe, expect, it } from 'vitest';

import { EVENT_KIND } from '../../src/types/game.js';
import { classifyEvent, parsePlayerActionPayload } from '../../src/utils/classify-event.js';

describe('classifyEvent', () => {
  it('reads phase-state events by their code', () => {
    expect(classifyEvent({ eventType: EVENT_KIND.state, payload: '2' })).toEqual({
      type: 'phase-state',
      code: '2',
      phase: 'discuss',
    });
    expect(classifyEvent({ eventType: EVENT_KIND.state, payload: '1' })).toEqual({
      type: 'phase-state',
      code: '1',
      phase: 'tasks',
    });
  });

  it('keeps unknown phase codes without a phase', () => {
    expect(classifyEvent({ eventType: EVENT_KIND.state, payload: '42' })).toEqual({
      type: 'phase-state',
      code: '42',
      phase: null,
    });
  });

  it('decodes player actions', () => {
    const payload = '{"Action":6,"Name":"Alice","Color":1,"IsDead":true,"Disconnected":false}';
    expect(classifyEvent({ eventType: EVENT_KIND.player, payload })).toEqual({
      type: 'player-action',
      action: 'exiled',
      name: 'Alice',
      payload,
    });
  });

  it('leaves an unknown action code unnamed', () => {
    const payload = '{"Action":99,"Name":"Bob"}';
    expect(classifyEvent({ eventType: EVENT_KIND.player, payload })).toEqual({
      type: 'player-action',
      action: null,
      name: 'Bob',
      payload,
    });
  });

  it('reports unparsable player payloads as malformed', () => {
    const res = classifyEvent({ eventType: EVENT_KIND.player, payload: '{not json' });
    expect(res.type).toBe('malformed');
  });

  it('reports payloads of the wrong shape as malformed', () => {
    expect(classifyEvent({ eventType: EVENT_KIND.player, payload: '{"Action":"two"}' }).type).toBe('malformed');
    expect(classifyEvent({ eventType: EVENT_KIND.player, payload: '3' }).type).toBe('malformed');
  });

  it('ignores other event kinds', () => {
    expect(classifyEvent({ eventType: EVENT_KIND.lobby, payload: '{}' })).toEqual({ type: 'ignored' });
    expect(classifyEvent({ eventType: EVENT_KIND.gameOver, payload: '' })).toEqual({ type: 'ignored' });
  });
});

describe('parsePlayerActionPayload', () => {
  it('fills missing fields with zero values', () => {
    expect(parsePlayerActionPayload('{"Name":"Carol"}')).toEqual({
      ok: true,
      value: { Action: 0, Name: 'Carol', Color: 0, IsDead: false, Disconnected: false },
    });
  });

  it('matches keys regardless of case', () => {
    expect(parsePlayerActionPayload('{"action":2,"NAME":"Dee","isDead":true}')).toEqual({
      ok: true,
      value: { Action: 2, Name: 'Dee', Color: 0, IsDead: true, Disconnected: false },
    });
  });

  it('treats null fields as zero values', () => {
    expect(parsePlayerActionPayload('{"Action":2,"Name":null,"Color":null}')).toEqual({
      ok: true,
      value: { Action: 2, Name: '', Color: 0, IsDead: false, Disconnected: false },
    });
    expect(parsePlayerActionPayload('null')).toEqual({
      ok: true,
      value: { Action: 0, Name: '', Color: 0, IsDead: false, Disconnected: false },
    });
  });

  it('rejects arrays', () => {
    expect(parsePlayerActionPayload('[2]').ok).toBe(false);
  });
});
