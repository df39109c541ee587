/**
 * Availability Scheduler
 * Priority queue over available orders with lazy deletion
 *
 * Ordering: priority (desc), deadline (asc), payout (desc), insertion sequence (asc).
 * With a shared clock, deadline ascending is the same as time remaining ascending.
 */

import type { Order, OrderId, OrderTransition } from '../core/types.js';
import { BinaryHeap } from '../core/priority-queue.js';
import { ConsistencyError } from '../core/errors.js';
import type { OrderRegistry } from './orders.js';

interface SchedulerEntry {
  orderId: OrderId;
  priority: number;
  deadline: number;
  payout: number;
  sequence: number;
  generation: number;
}

export function compareEntries(a: SchedulerEntry, b: SchedulerEntry): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  if (a.deadline !== b.deadline) return a.deadline - b.deadline;
  if (a.payout !== b.payout) return b.payout - a.payout;
  return a.sequence - b.sequence;
}

export interface SchedulerOptions {
  debug?: boolean;
}

export class AvailabilityScheduler {
  private heap = new BinaryHeap<SchedulerEntry>(compareEntries);
  /** Live generation per order; an entry is valid only if it carries this stamp */
  private liveGenerations = new Map<OrderId, number>();
  private generationCounter = 0;
  /** Insertion sequence per order, assigned on first push and kept for re-pushes */
  private sequences = new Map<OrderId, number>();
  private sequenceCounter = 0;
  private discarded = 0;
  private lastRepair: ConsistencyError | null = null;
  private unsubscribe: (() => void) | null = null;
  private readonly debug: boolean;

  constructor(
    private readonly registry: OrderRegistry,
    options: SchedulerOptions = {}
  ) {
    this.debug = options.debug ?? false;
  }

  /**
   * Follow registry transitions: entering available pushes, leaving it invalidates.
   * Orders already available are queued in registration order.
   */
  attach(): void {
    if (this.unsubscribe) return;

    for (const order of this.registry.list('available')) {
      if (!this.liveGenerations.has(order.id)) {
        this.push(order);
      }
    }

    this.unsubscribe = this.registry.subscribe((t) => this.onTransition(t));
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  private onTransition(transition: OrderTransition): void {
    if (transition.to === 'available') {
      this.push(this.registry.get(transition.orderId));
    } else if (transition.from === 'available') {
      this.invalidate(transition.orderId);
    }
  }

  // ==========================================================================
  // Queue operations
  // ==========================================================================

  /**
   * O(log n). Re-pushing an order supersedes any entry it already has and keeps
   * its original insertion sequence.
   */
  push(order: Readonly<Order>): void {
    const generation = ++this.generationCounter;
    this.liveGenerations.set(order.id, generation);
    this.heap.push({
      orderId: order.id,
      priority: order.priority,
      deadline: order.deadline,
      payout: order.payout,
      sequence: this.sequenceOf(order.id),
      generation,
    });
  }

  private sequenceOf(orderId: OrderId): number {
    let sequence = this.sequences.get(orderId);
    if (sequence === undefined) {
      sequence = this.sequenceCounter++;
      this.sequences.set(orderId, sequence);
    }
    return sequence;
  }

  /**
   * O(1). The stale heap entry is dropped when it reaches the top.
   */
  invalidate(orderId: OrderId): void {
    this.liveGenerations.delete(orderId);
  }

  /**
   * Highest-ranked available order without removing it
   */
  peek(): Readonly<Order> | null {
    this.discardStale();
    const top = this.heap.peek();
    return top ? this.registry.get(top.orderId) : null;
  }

  /**
   * Remove and return the highest-ranked available order. O(log n) amortized.
   */
  pop(): Readonly<Order> | null {
    this.discardStale();
    const top = this.heap.pop();
    if (!top) return null;
    this.liveGenerations.delete(top.orderId);
    return this.registry.get(top.orderId);
  }

  /**
   * Valid entries in pop order, without popping
   */
  listAvailable(): Readonly<Order>[] {
    return this.heap
      .toSortedArray()
      .filter((entry) => this.isValid(entry))
      .map((entry) => this.registry.get(entry.orderId));
  }

  /** Number of valid entries */
  get size(): number {
    return this.liveGenerations.size;
  }

  /** Heap length including stale entries not yet discarded */
  get rawSize(): number {
    return this.heap.size;
  }

  get staleDiscards(): number {
    return this.discarded;
  }

  get lastConsistencyRepair(): ConsistencyError | null {
    return this.lastRepair;
  }

  getSequenceCounter(): number {
    return this.sequenceCounter;
  }

  /**
   * Every assigned insertion sequence, for serialization
   */
  getSequences(): Array<[OrderId, number]> {
    return [...this.sequences];
  }

  /**
   * Rebuild from the registry, e.g. after loading a save.
   * Saved sequences are reused; available orders without one are numbered in the given order.
   */
  rebuild(
    orderIds: readonly OrderId[],
    sequenceCounter: number,
    sequences: ReadonlyArray<readonly [OrderId, number]> = []
  ): void {
    this.heap.clear();
    this.liveGenerations.clear();
    this.sequences = new Map(sequences.map(([id, sequence]) => [id, sequence]));
    this.sequenceCounter = sequences.reduce((max, [, sequence]) => Math.max(max, sequence + 1), 0);

    for (const id of orderIds) {
      const order = this.registry.get(id);
      if (order.status === 'available') {
        this.push(order);
      }
    }
    this.sequenceCounter = Math.max(this.sequenceCounter, sequenceCounter);
  }

  /**
   * Available order ids in insertion sequence, for serialization
   */
  queuedIds(): OrderId[] {
    return [...this.heap.toSortedArray()]
      .filter((entry) => this.isValid(entry))
      .sort((a, b) => a.sequence - b.sequence)
      .map((entry) => entry.orderId);
  }

  // ==========================================================================
  // Lazy deletion
  // ==========================================================================

  private isValid(entry: SchedulerEntry): boolean {
    return (
      this.liveGenerations.get(entry.orderId) === entry.generation &&
      this.registry.has(entry.orderId) &&
      this.registry.get(entry.orderId).status === 'available'
    );
  }

  private discardStale(): void {
    for (let top = this.heap.peek(); top && !this.isValid(top); top = this.heap.peek()) {
      this.heap.pop();
      this.discarded++;

      // Generation still live but the registry disagrees: the entry was never invalidated
      if (this.liveGenerations.get(top.orderId) === top.generation) {
        this.liveGenerations.delete(top.orderId);
        this.lastRepair = new ConsistencyError(
          `Queued order ${top.orderId} is no longer available; entry dropped`
        );
        if (this.debug) {
          console.warn(`[Scheduler] ${this.lastRepair.message}`);
        }
      }
    }
  }
}
