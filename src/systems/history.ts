/**
 * History / Undo Manager
 * Bounded stack of immutable snapshots taken before each mutating command
 *
 * A snapshot freezes player and inventory state. Order state is captured
 * copy-on-write: while a snapshot is on top of the stack, the first change to
 * any order records that order's previous progress into it.
 */

import type {
  OrderId,
  OrderProgress,
  OrderStatus,
  OrderTransition,
  PlayerState,
  SortMode,
} from '../core/types.js';
import { EmptyHistoryError } from '../core/errors.js';
import type { OrderRegistry } from './orders.js';

export interface InventoryCapture {
  entries: Array<{ id: OrderId; status: OrderStatus }>;
  focusedId: OrderId | null;
  sortMode: SortMode;
}

export interface CapturedState {
  time: number;
  player: PlayerState;
  inventory: InventoryCapture;
}

export interface Snapshot {
  readonly label: string;
  readonly state: Readonly<CapturedState>;
  readonly deltas: ReadonlyMap<OrderId, Readonly<OrderProgress>>;
}

/**
 * What the manager needs from its owner: a way to read and write compound state
 */
export interface HistoryHost {
  captureState(): CapturedState;
  restoreState(state: Readonly<CapturedState>): void;
  now(): number;
}

export interface SerializedSnapshot {
  label: string;
  state: CapturedState;
  deltas: Array<[OrderId, OrderProgress]>;
}

interface HistoryEntry {
  label: string;
  state: Readonly<CapturedState>;
  deltas: Map<OrderId, OrderProgress>;
}

export interface HistoryOptions {
  depth?: number;
  debug?: boolean;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function cloneState(state: Readonly<CapturedState>): CapturedState {
  return {
    time: state.time,
    player: { ...state.player, position: { ...state.player.position } },
    inventory: {
      entries: state.inventory.entries.map((e) => ({ ...e })),
      focusedId: state.inventory.focusedId,
      sortMode: state.inventory.sortMode,
    },
  };
}

export class HistoryManager {
  private stack: HistoryEntry[] = [];
  private readonly depth: number;
  private readonly debug: boolean;
  private readonly unsubscribe: () => void;

  constructor(
    private readonly registry: OrderRegistry,
    private readonly host: HistoryHost,
    options: HistoryOptions = {}
  ) {
    this.depth = Math.max(1, options.depth ?? 20);
    this.debug = options.debug ?? false;
    this.unsubscribe = registry.subscribe((t) => this.onTransition(t));
  }

  private onTransition(transition: OrderTransition): void {
    if (transition.cause === 'register' || transition.cause === 'restore') return;
    const top = this.stack[this.stack.length - 1];
    if (top && !top.deltas.has(transition.orderId)) {
      top.deltas.set(transition.orderId, { ...transition.previous });
    }
  }

  // ==========================================================================
  // Recording
  // ==========================================================================

  /**
   * Push a snapshot, then run the action. If the action throws, the snapshot is
   * discarded and the error propagates.
   */
  recordBefore<T>(label: string, action: () => T): T {
    const entry: HistoryEntry = {
      label,
      state: deepFreeze(cloneState(this.host.captureState())),
      deltas: new Map(),
    };
    this.stack.push(entry);

    let result: T;
    try {
      result = action();
    } catch (error) {
      this.discard(entry);
      throw error;
    }

    // A failed action leaves history unchanged, so trim only after it returns
    if (this.stack.length > this.depth) {
      this.stack.shift();
    }
    return result;
  }

  /**
   * Drop a snapshot whose action failed. Deltas it gathered move to the snapshot below.
   */
  private discard(entry: HistoryEntry): void {
    const index = this.stack.lastIndexOf(entry);
    if (index === -1) return;
    this.stack.splice(index, 1);

    const below = this.stack[index - 1];
    if (!below) return;
    for (const [id, progress] of entry.deltas) {
      if (!below.deltas.has(id)) below.deltas.set(id, progress);
    }
  }

  // ==========================================================================
  // Undo
  // ==========================================================================

  /**
   * Restore the state captured by the most recent snapshot. Not itself recorded.
   */
  undo(): Snapshot {
    const entry = this.stack.pop();
    if (!entry) {
      throw new EmptyHistoryError();
    }

    const time = this.host.now();
    for (const [id, progress] of entry.deltas) {
      this.registry.restore(id, progress, time);
    }
    this.host.restoreState(entry.state);

    if (this.debug) {
      console.log(`[History] Undid "${entry.label}" (${entry.deltas.size} order(s) restored, ${this.stack.length} left)`);
    }

    return this.toSnapshot(entry);
  }

  canUndo(): boolean {
    return this.stack.length > 0;
  }

  get size(): number {
    return this.stack.length;
  }

  get maxDepth(): number {
    return this.depth;
  }

  peek(): Snapshot | null {
    const top = this.stack[this.stack.length - 1];
    return top ? this.toSnapshot(top) : null;
  }

  labels(): string[] {
    return this.stack.map((e) => e.label);
  }

  clear(): void {
    this.stack = [];
  }

  detach(): void {
    this.unsubscribe();
  }

  private toSnapshot(entry: HistoryEntry): Snapshot {
    const deltas = new Map<OrderId, Readonly<OrderProgress>>();
    for (const [id, progress] of entry.deltas) {
      deltas.set(id, Object.freeze({ ...progress }));
    }
    return Object.freeze({ label: entry.label, state: entry.state, deltas });
  }

  // ==========================================================================
  // Serialization
  // ==========================================================================

  serialize(): SerializedSnapshot[] {
    return this.stack.map((entry) => ({
      label: entry.label,
      state: cloneState(entry.state),
      deltas: Array.from(entry.deltas.entries()).map(([id, p]): [OrderId, OrderProgress] => [id, { ...p }]),
    }));
  }

  deserialize(snapshots: readonly SerializedSnapshot[]): void {
    this.stack = snapshots.slice(-this.depth).map((s) => ({
      label: s.label,
      state: deepFreeze(cloneState(s.state)),
      deltas: new Map(s.deltas.map(([id, p]): [OrderId, OrderProgress] => [id, { ...p }])),
    }));
  }
}
