import { describe, expect, it } from '@jest/globals';
import { ConfigurationError } from '../config/config.errors.js';
import { SessionService } from './session.service.js';

describe('SessionService', () => {
  it('creates distinct session ids', () => {
    const sessions = new SessionService({ maxHistory: 2 });

    const first = sessions.createSession();
    const second = sessions.createSession();

    expect(first).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
    expect(second).not.toBe(first);
    expect(sessions.getHistory(first)).toEqual([]);
  });

  it('keeps only the most recent exchanges', () => {
    const sessions = new SessionService({ maxHistory: 2 });
    const id = sessions.createSession();

    sessions.addExchange(id, 'q1', 'a1');
    sessions.addExchange(id, 'q2', 'a2');
    sessions.addExchange(id, 'q3', 'a3');

    expect(sessions.getHistory(id)).toEqual([
      { user: 'q2', assistant: 'a2' },
      { user: 'q3', assistant: 'a3' },
    ]);
  });

  it('starts a session for an unknown id on first exchange', () => {
    const sessions = new SessionService({ maxHistory: 2 });

    expect(sessions.getHistory('unknown')).toEqual([]);
    sessions.addExchange('unknown', 'q', 'a');
    expect(sessions.getHistory('unknown')).toEqual([
      { user: 'q', assistant: 'a' },
    ]);
  });

  it('hands out copies of the history', () => {
    const sessions = new SessionService({ maxHistory: 2 });
    const id = sessions.createSession();
    sessions.addExchange(id, 'q', 'a');

    const history = sessions.getHistory(id);
    history[0].assistant = 'changed';
    history.push({ user: 'extra', assistant: 'extra' });

    expect(sessions.getHistory(id)).toEqual([{ user: 'q', assistant: 'a' }]);
  });

  it('stores nothing when history is disabled', () => {
    const sessions = new SessionService({ maxHistory: 0 });
    const id = sessions.createSession();
    sessions.addExchange(id, 'q', 'a');

    expect(sessions.getHistory(id)).toEqual([]);
  });

  it('rejects a negative history size', () => {
    expect(() => new SessionService({ maxHistory: -1 })).toThrow(
      ConfigurationError,
    );
  });
});
