// src/services/confirmationFlow.test.ts
import { describe, it, expect, beforeEach } from 'vitest';
import db from '../db/db.js';
import { getPendingAction, savePendingAction } from '../db/pendingActionDb.js';
import { ActionExecutor } from './actionExecutor.js';
import { parseSelection, recordOutcome, resolvePendingTurn } from './confirmationFlow.js';
import { InMemoryCalendarStore, silentLogger } from '../../tests/helpers/inMemoryCalendarStore.js';
import type { MatchCandidate } from '../types/calendar.js';
import type { ExecutionResult, ParsedIntent } from '../types/intent.js';

const now = new Date('2026-10-19T17:00:00Z');
const timeZone = 'America/Los_Angeles';

const matches: MatchCandidate[] = [
  {
    id: 'e3',
    title: 'Project meeting',
    start: '2026-10-20T10:00:00-07:00',
    end: '2026-10-20T11:00:00-07:00',
    time: '10:00 AM - 11:00 AM',
  },
  {
    id: 'e1',
    title: 'Team Meeting',
    start: '2026-10-20T14:00:00-07:00',
    end: '2026-10-20T15:00:00-07:00',
    time: '2:00 PM - 3:00 PM',
  },
];

const deleteIntent: ParsedIntent = { action: 'delete', title: 'meeting', date: 'tomorrow', confidence: 0.9 };

describe('parseSelection', () => {
  it.each([
    ['2', 2],
    ['option 3', 3],
    ['Option2', 2],
    ['2nd', 2],
    ['the 2 one', 2],
  ])('should read %s as %i', (message, expected) => {
    expect(parseSelection(message)).toBe(expected);
  });

  it('should read a digit in a short command as a selection', () => {
    expect(parseSelection('move it to 3 pm')).toBe(3);
  });

  it.each(['the 3rd', 'delete my meeting tomorrow', 'cancel it'])('should not read %s as a selection', (message) => {
    expect(parseSelection(message)).toBeNull();
  });
});

describe('confirmation flow', () => {
  let store: InMemoryCalendarStore;
  let executor: ActionExecutor;

  beforeEach(() => {
    db.exec('DELETE FROM pending_confirmations');
    store = new InMemoryCalendarStore(
      matches.map(({ id, title, start, end }) => ({ id, title, start, end }))
    );
    executor = new ActionExecutor({ store, timeZone, log: silentLogger(), now: () => now });
  });

  describe('resolvePendingTurn', () => {
    it('should do nothing without a pending selection', async () => {
      expect(await resolvePendingTurn('session-a', '1', executor, now)).toEqual({ kind: 'none' });
    });

    it('should delete the chosen candidate and clear the pending state', async () => {
      savePendingAction('session-a', { action: 'delete', intent: deleteIntent, matches }, 600, now);

      const turn = await resolvePendingTurn('session-a', '2', executor, now);

      expect(turn).toEqual({
        kind: 'executed',
        action: 'delete',
        intent: { ...deleteIntent, title: 'Team Meeting' },
        result: { success: true, message: 'Event deleted successfully', needs_confirmation: false },
      });
      expect(store.deletedIds).toEqual(['e1']);
      expect(getPendingAction('session-a', now)).toBeNull();
    });

    it('should move the chosen candidate to the pending target', async () => {
      const moveIntent: ParsedIntent = { action: 'move', title: 'meeting', new_time: '4pm', confidence: 0.9 };
      savePendingAction('session-a', { action: 'move', intent: moveIntent, matches }, 600, now);

      const turn = await resolvePendingTurn('session-a', '1', executor, now);

      expect(turn.kind).toBe('executed');
      if (turn.kind === 'executed') {
        expect(turn.result.event?.start).toBe('2026-10-20T16:00:00-07:00');
        expect(turn.result.event?.end).toBe('2026-10-20T17:00:00-07:00');
      }
    });

    it('should keep the pending state on an out-of-range selection', async () => {
      savePendingAction('session-a', { action: 'delete', intent: deleteIntent, matches }, 600, now);

      expect(await resolvePendingTurn('session-a', '5', executor, now)).toEqual({ kind: 'invalid', max: 2 });
      expect(getPendingAction('session-a', now)?.matches).toHaveLength(2);
      expect(store.deletedIds).toEqual([]);
    });

    it('should abandon the pending state when a new command arrives', async () => {
      savePendingAction('session-a', { action: 'delete', intent: deleteIntent, matches }, 600, now);

      expect(await resolvePendingTurn('session-a', 'what is on friday', executor, now)).toEqual({ kind: 'none' });
      expect(getPendingAction('session-a', now)).toBeNull();
    });

    it('should ignore a pending state that has expired', async () => {
      savePendingAction('session-a', { action: 'delete', intent: deleteIntent, matches }, 600, now);
      const later = new Date(now.getTime() + 601 * 1000);

      expect(await resolvePendingTurn('session-a', '1', executor, later)).toEqual({ kind: 'none' });
      expect(store.deletedIds).toEqual([]);
    });
  });

  describe('recordOutcome', () => {
    const ambiguous: ExecutionResult = {
      success: false,
      message: 'Found 2 matching events. Please specify which one:',
      multiple_matches: matches,
      needs_confirmation: true,
    };

    it('should save a multi-match for the next turn', () => {
      recordOutcome('session-a', 'delete', deleteIntent, ambiguous, { ttlSeconds: 600, now });

      expect(getPendingAction('session-a', now)).toEqual({ action: 'delete', intent: deleteIntent, matches });
    });

    it('should clear the pending state after any other outcome', () => {
      savePendingAction('session-a', { action: 'delete', intent: deleteIntent, matches }, 600, now);

      recordOutcome(
        'session-a',
        'list',
        { action: 'list', confidence: 0.9 },
        { success: true, message: 'Found 0 event(s)', events: [], needs_confirmation: false },
        { ttlSeconds: 600, now }
      );

      expect(getPendingAction('session-a', now)).toBeNull();
    });

    it('should not save a single candidate', () => {
      recordOutcome(
        'session-a',
        'move',
        deleteIntent,
        { ...ambiguous, multiple_matches: matches.slice(0, 1) },
        { ttlSeconds: 600, now }
      );

      expect(getPendingAction('session-a', now)).toBeNull();
    });
  });
});
