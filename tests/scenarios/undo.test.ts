/**
 * Undo Tests
 * Every recorded command is exactly reversed by the undo that follows it
 */

import { describe, it, expect } from 'vitest';
import { GameSession, type Command } from '../../src/core/simulation.js';
import { createSessionData, createSpec } from '../fixtures.js';

/**
 * Everything undo promises to put back
 */
function observe(session: GameSession) {
  return {
    player: { ...session.getPlayer() },
    inventory: session.inventory.ids(),
    focusedId: session.inventory.focusedId(),
    sortMode: session.inventory.sortMode,
    orders: session.registry.list().map((o) => [o.id, o.status, o.acceptedAt, o.pickedUpAt, o.resolvedAt]),
    available: session.scheduler.listAvailable().map((o) => o.id),
  };
}

function run(session: GameSession, ...commands: Command[]): void {
  for (const command of commands) {
    const result = session.dispatch(command);
    if (!result.ok) throw new Error(`${command.type} failed: ${result.error}`);
  }
}

function createSession(): GameSession {
  return new GameSession(
    createSessionData([
      createSpec('near', { pickup: { x: 1, y: 0 }, dropoff: { x: 2, y: 0 }, priority: 2, payout: 50, weight: 2 }),
      createSpec('far', { pickup: { x: 7, y: 4 }, dropoff: { x: 0, y: 4 }, priority: 1, payout: 30, deadline: 200, weight: 1 }),
    ])
  );
}

function expectUndoRestores(session: GameSession, command: Command): void {
  const before = observe(session);
  const historyDepth = session.history.size;

  const result = session.dispatch(command);
  expect(result.ok).toBe(true);
  expect(observe(session)).not.toEqual(before);

  expect(session.dispatch({ type: 'undo' }).ok).toBe(true);
  expect(observe(session)).toEqual(before);
  expect(session.history.size).toBe(historyDepth);
}

describe('Undo', () => {
  it('should undo a move', () => {
    expectUndoRestores(createSession(), { type: 'move', direction: 'right' });
  });

  it('should undo an accept', () => {
    expectUndoRestores(createSession(), { type: 'accept' });
  });

  it('should undo a pickup', () => {
    const session = createSession();
    run(session, { type: 'accept' });
    expectUndoRestores(session, { type: 'pickup' });
  });

  it('should undo a delivery', () => {
    const session = createSession();
    run(session, { type: 'accept' }, { type: 'pickup' }, { type: 'move', direction: 'right' });
    expectUndoRestores(session, { type: 'deliver' });
    expect(session.getPlayer().earnings).toBe(0);
  });

  it('should undo a cancellation', () => {
    const session = createSession();
    run(session, { type: 'accept' }, { type: 'pickup' });
    expectUndoRestores(session, { type: 'cancel' });
    expect(session.getPlayer().reputation).toBe(70);
  });

  it('should undo a sort mode change', () => {
    const session = createSession();
    run(session, { type: 'accept' }, { type: 'accept' }, { type: 'cycleSortMode' });
    // deadline mode: far (200) before near (300)
    expect(session.inventory.ids()).toEqual(['far', 'near']);
    expectUndoRestores(session, { type: 'cycleSortMode' });
  });

  it('should return an undone order to its place among tied orders', () => {
    const session = new GameSession(
      createSessionData([
        createSpec('O1', { priority: 1, deadline: 100, payout: 50 }),
        createSpec('O2', { priority: 0, deadline: 100, payout: 50 }),
        createSpec('O3', { priority: 1, deadline: 100, payout: 50 }),
      ])
    );
    expect(session.scheduler.listAvailable().map((o) => o.id)).toEqual(['O1', 'O3', 'O2']);

    expectUndoRestores(session, { type: 'accept' });
    expect(session.scheduler.peek()?.id).toBe('O1');
  });

  it('should unwind a chain of commands in reverse order', () => {
    const session = createSession();
    const start = observe(session);

    run(session, { type: 'accept' }, { type: 'pickup' }, { type: 'move', direction: 'right' }, { type: 'deliver' });
    expect(session.history.labels()).toEqual(['accept near', 'pickup near', 'move', 'deliver near']);

    for (let i = 0; i < 4; i++) run(session, { type: 'undo' });
    expect(observe(session)).toEqual(start);
    expect(session.dispatch({ type: 'undo' })).toMatchObject({ ok: false, code: 'EMPTY_HISTORY' });
  });

  it('should not record navigation or menu views', () => {
    const session = createSession();
    run(session, { type: 'accept' }, { type: 'accept' });
    const depth = session.history.size;

    run(session, { type: 'navigate', direction: 'prev' }, { type: 'openInventoryMenu' });
    expect(session.history.size).toBe(depth);
  });
});
