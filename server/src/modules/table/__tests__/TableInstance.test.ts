import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  NotYourTurnError,
  StatePersistenceFailureError,
  TableNotFoundError,
  formatCard,
} from '../../../shared/logic/index.js';
import { MemoryTableStateStore } from '../store/MemoryTableStateStore.js';
import { TableInstance } from '../TableInstance.js';
import { OPTIONS, createRecordingNotifier, setupTable } from './testHelpers.js';

const instances: TableInstance[] = [];

async function setup(options?: Parameters<typeof setupTable>[0]) {
  const result = await setupTable(options);
  instances.push(result.table);
  return result;
}

beforeEach(() => {
  vi.useFakeTimers();
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  instances.splice(0).forEach(t => t.shutdown());
  vi.useRealTimers();
  vi.restoreAllMocks();
});

// ============================================
// A. Start and notify
// ============================================

describe('TableInstance - start', () => {
  it('startTable commits version 1 and deals the first hand', async () => {
    const { table, store } = await setup();

    const { table: state, events } = await table.startTable();

    expect(state.version).toBe(1);
    expect(state.status).toBe('in_progress');
    expect(events.map(e => e.type)).toEqual(['table_started', 'hand_started', 'blinds_posted']);
    expect(await store.loadTableState('table-1')).toEqual(state);
  });

  it('publishes a public view without hole cards and a private view per owner', async () => {
    const { table, notifier } = await setup();

    await table.startTable();

    expect(notifier.publicViews).toHaveLength(1);
    const view = notifier.publicViews[0];
    expect(view.seats.map(s => [s.seatNumber, s.hasCards, s.holeCards])).toEqual([
      [1, true, null],
      [2, true, null],
    ]);
    expect(view.hand?.toActSeat).toBe(1);
    expect(view.actionDeadline).toBe(Date.now() + OPTIONS.actionTimeoutMs);

    // deck rotated by one, dealt 2,1,2,1
    expect(notifier.privateViews.map(p => [p.playerId, p.view.holeCards.map(formatCard)])).toEqual([
      ['player-1', ['4h', '6h']],
      ['player-2', ['3h', '5h']],
    ]);
    expect(notifier.privateViews[0].view.validActions.actions).toEqual(['fold', 'call', 'raise']);
    expect(notifier.privateViews[1].view.validActions.actions).toEqual([]);
  });

  it('rejects an unknown table', async () => {
    const store = new MemoryTableStateStore();
    const table = new TableInstance('missing', store, createRecordingNotifier(), OPTIONS);
    instances.push(table);

    await expect(table.startTable()).rejects.toThrow(TableNotFoundError);
  });
});

// ============================================
// B. Actions and ordering
// ============================================

describe('TableInstance - actions', () => {
  it('applies actions and bumps the version once per commit', async () => {
    const { table } = await setup();
    await table.startTable();

    const { table: state } = await table.submitAction({ seat: 1, kind: 'call' });

    expect(state.version).toBe(2);
    expect(state.hand?.round.toActSeat).toBe(2);
  });

  it('rejects a seat that is not to act without changing state', async () => {
    const { table, store, notifier } = await setup();
    await table.startTable();

    await expect(table.submitAction({ seat: 2, kind: 'check' })).rejects.toThrow(NotYourTurnError);

    expect((await store.loadTableState('table-1'))?.version).toBe(1);
    expect(notifier.publicViews).toHaveLength(1);
  });

  it('applies concurrent submissions in submission order', async () => {
    const { table } = await setup();
    await table.startTable();

    const results = await Promise.allSettled([
      table.submitAction({ seat: 1, kind: 'call' }),
      table.submitAction({ seat: 2, kind: 'check' }),
    ]);

    expect(results.map(r => r.status)).toEqual(['fulfilled', 'fulfilled']);
    const state = await table.getState();
    expect(state.version).toBe(3);
    expect(state.hand?.street).toBe('flop');
  });

  it('rejects an out-of-turn submission instead of queueing it behind the seat to act', async () => {
    const { table } = await setup();
    await table.startTable();

    const [early, onTurn] = await Promise.allSettled([
      table.submitAction({ seat: 2, kind: 'check' }),
      table.submitAction({ seat: 1, kind: 'call' }),
    ]);

    expect(early.status).toBe('rejected');
    expect(onTurn.status).toBe('fulfilled');
    expect((await table.getState()).hand?.round.toActSeat).toBe(2);
  });

  it('answers valid actions and views from committed state', async () => {
    const { table } = await setup();
    await table.startTable();

    expect(await table.getValidActions(1)).toEqual({
      seat: 1,
      actions: ['fold', 'call', 'raise'],
      callAmount: 5,
      minBet: null,
      minRaiseTo: 20,
      maxRaiseTo: 1000,
    });
    expect((await table.getPlayerView('player-2'))?.seatNumber).toBe(2);
    expect(await table.getPlayerView('nobody')).toBeNull();
    expect((await table.getPublicView()).version).toBe(1);
  });
});

// ============================================
// C. Persistence failures
// ============================================

describe('TableInstance - persistence', () => {
  it('retries a failed commit once', async () => {
    const { table, store } = await setup();
    await table.startTable();
    const commits = store.commitCount;

    store.failNextCommits(1);
    const { table: state } = await table.submitAction({ seat: 1, kind: 'call' });

    expect(state.version).toBe(2);
    expect(store.commitCount).toBe(commits + 1);
  });

  it('reports a second failure and leaves stored state untouched', async () => {
    const { table, store, notifier } = await setup();
    await table.startTable();
    const before = await store.loadTableState('table-1');

    store.failNextCommits(2);
    await expect(table.submitAction({ seat: 1, kind: 'call' })).rejects.toThrow(StatePersistenceFailureError);

    expect(await store.loadTableState('table-1')).toEqual(before);
    expect(notifier.publicViews).toHaveLength(1);

    // the table keeps working afterwards
    const { table: state } = await table.submitAction({ seat: 1, kind: 'call' });
    expect(state.version).toBe(2);
  });

  it('reloads and recomputes when another writer got there first', async () => {
    const { table, store } = await setup();
    await table.startTable();
    const current = await store.loadTableState('table-1');
    if (!current) throw new Error('missing state');

    const commit = store.commitTableState.bind(store);
    const spy = vi.spyOn(store, 'commitTableState').mockImplementationOnce(async (tableId, newState) => {
      // a concurrent writer stores the same version first
      store.put({ ...current, version: newState.version });
      return commit(tableId, newState);
    });

    const { table: state } = await table.submitAction({ seat: 1, kind: 'call' });

    expect(spy).toHaveBeenCalledTimes(2);
    expect(state.version).toBe(3);
    expect(state.hand?.round.committed[1]).toBe(10);
  });
});

// ============================================
// D. Timers
// ============================================

describe('TableInstance - timers', () => {
  it('folds a seat that lets its action timer run out', async () => {
    const { table } = await setup();
    await table.startTable();

    vi.advanceTimersByTime(OPTIONS.actionTimeoutMs);
    await table.idle();

    const state = await table.getState();
    expect(state.hand?.isComplete).toBe(true);
    expect(state.hand?.actions).toEqual([
      { seat: 1, kind: 'fold', amount: 0, streetTotal: 5, street: 'preflop', isAllIn: false, timedOut: true },
    ]);
  });

  it('checks for a timed-out seat when checking is legal', async () => {
    const { table } = await setup();
    await table.startTable();
    await table.submitAction({ seat: 1, kind: 'call' });

    vi.advanceTimersByTime(OPTIONS.actionTimeoutMs);
    await table.idle();

    const state = await table.getState();
    expect(state.hand?.actions[1]).toMatchObject({ seat: 2, kind: 'check', timedOut: true });
    expect(state.hand?.street).toBe('flop');
  });

  it('cancels the timer when the seat acts in time', async () => {
    const { table } = await setup();
    await table.startTable();

    vi.advanceTimersByTime(10000);
    await table.submitAction({ seat: 1, kind: 'call' });

    // the first timer would have fired here
    vi.advanceTimersByTime(10000);
    await table.idle();
    expect((await table.getState()).hand?.actions).toHaveLength(1);

    // the new seat's own timer
    vi.advanceTimersByTime(10000);
    await table.idle();
    expect((await table.getState()).hand?.actions).toHaveLength(2);
  });

  it('deals the next hand automatically when enabled', async () => {
    const { table } = await setup({ runtime: { autoStartNextHand: true } });
    await table.startTable();
    await table.submitAction({ seat: 1, kind: 'fold' });

    vi.advanceTimersByTime(OPTIONS.nextHandDelayMs);
    await table.idle();

    const state = await table.getState();
    expect(state.handNumber).toBe(2);
    expect(state.hand?.buttonSeat).toBe(2);
  });

  it('does not deal while paused, and resumes dealing after resume', async () => {
    const { table } = await setup({ runtime: { autoStartNextHand: true } });
    await table.startTable();
    await table.pauseTable();
    await table.submitAction({ seat: 1, kind: 'fold' });

    vi.advanceTimersByTime(OPTIONS.nextHandDelayMs);
    await table.idle();
    expect((await table.getState()).handNumber).toBe(1);

    await table.resumeTable();
    vi.advanceTimersByTime(OPTIONS.nextHandDelayMs);
    await table.idle();
    expect((await table.getState()).handNumber).toBe(2);
  });

  it('arms the action timer again when the timeout cannot be stored', async () => {
    const { table, store } = await setup();
    await table.startTable();

    store.failNextCommits(2);
    vi.advanceTimersByTime(OPTIONS.actionTimeoutMs);
    await table.idle();
    expect((await table.getState()).hand?.actions).toHaveLength(0);

    vi.advanceTimersByTime(OPTIONS.actionTimeoutMs);
    await table.idle();

    const state = await table.getState();
    expect(state.hand?.actions).toEqual([
      { seat: 1, kind: 'fold', amount: 0, streetTotal: 5, street: 'preflop', isAllIn: false, timedOut: true },
    ]);
    expect(state.hand?.isComplete).toBe(true);
  });

  it('tries the next hand again when dealing it cannot be stored', async () => {
    const { table, store } = await setup({ runtime: { autoStartNextHand: true } });
    await table.startTable();
    await table.submitAction({ seat: 1, kind: 'fold' });

    store.failNextCommits(2);
    vi.advanceTimersByTime(OPTIONS.nextHandDelayMs);
    await table.idle();
    expect((await table.getState()).handNumber).toBe(1);

    vi.advanceTimersByTime(OPTIONS.nextHandDelayMs);
    await table.idle();
    expect((await table.getState()).handNumber).toBe(2);
  });

  it('shutdown stops pending timers', async () => {
    const { table } = await setup();
    await table.startTable();

    table.shutdown();
    vi.advanceTimersByTime(OPTIONS.actionTimeoutMs);
    await table.idle();

    expect((await table.getState()).hand?.actions).toHaveLength(0);
  });
});

// ============================================
// E. Independent tables
// ============================================

describe('TableInstance - independence', () => {
  it('tables sharing a store progress independently', async () => {
    const store = new MemoryTableStateStore();
    const { table: a } = await setup({ tableId: 'a', store });
    const { table: b } = await setup({ tableId: 'b', store, playerCount: 3 });

    await Promise.all([a.startTable(), b.startTable()]);
    await a.submitAction({ seat: 1, kind: 'fold' });

    const stateA = await a.getState();
    const stateB = await b.getState();
    expect(stateA.version).toBe(2);
    expect(stateA.hand?.isComplete).toBe(true);
    expect(stateB.version).toBe(1);
    expect(stateB.hand?.round.toActSeat).toBe(1);
  });
});
