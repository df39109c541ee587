/**
 * Inventory
 * Ordered, cursor-navigable list of orders the courier is carrying or has accepted.
 * Holds order ids only; the registry stays the owner of every order.
 */

import type { InventoryLimits, Order, OrderId, SortMode } from '../core/types.js';
import { SORT_MODES } from '../core/types.js';
import { KeyedLinkedList } from '../core/linked-list.js';
import { mergeSort } from '../core/sorting.js';
import { InventoryFullError } from '../core/errors.js';

export type OrderLookup = (id: OrderId) => Readonly<Order>;
export type OrderComparator = (a: Readonly<Order>, b: Readonly<Order>) => number;

/**
 * Comparators per sort mode: priority and payout highest first, deadline soonest first
 */
export const SORT_COMPARATORS: Record<SortMode, OrderComparator> = {
  priority: (a, b) => b.priority - a.priority,
  deadline: (a, b) => a.deadline - b.deadline,
  payout: (a, b) => b.payout - a.payout,
};

export function nextSortMode(mode: SortMode): SortMode {
  const index = SORT_MODES.indexOf(mode);
  return SORT_MODES[(index + 1) % SORT_MODES.length];
}

export class Inventory {
  private list = new KeyedLinkedList<OrderId>();
  private mode: SortMode = 'priority';

  constructor(
    private readonly lookup: OrderLookup,
    private readonly limits: InventoryLimits
  ) {}

  // ==========================================================================
  // Capacity
  // ==========================================================================

  get count(): number {
    return this.list.size;
  }

  get sortMode(): SortMode {
    return this.mode;
  }

  /**
   * Sum of the weights of the orders held
   */
  currentWeight(): number {
    return this.list.values().reduce((sum, id) => sum + this.lookup(id).weight, 0);
  }

  /**
   * Throws InventoryFullError if the order would exceed either limit
   */
  assertCanAdd(order: Readonly<Order>): void {
    if (this.list.size + 1 > this.limits.maxOrders) {
      throw new InventoryFullError(
        `Inventory holds ${this.list.size}/${this.limits.maxOrders} orders`
      );
    }
    const weight = this.currentWeight();
    if (weight + order.weight > this.limits.maxWeight) {
      throw new InventoryFullError(
        `Order ${order.id} (${order.weight}) exceeds remaining capacity ${(this.limits.maxWeight - weight).toFixed(1)}`
      );
    }
  }

  canAdd(order: Readonly<Order>): boolean {
    try {
      this.assertCanAdd(order);
      return true;
    } catch (error) {
      if (error instanceof InventoryFullError) return false;
      throw error;
    }
  }

  // ==========================================================================
  // Mutation
  // ==========================================================================

  /**
   * Append at the tail (O(1) plus the weight check)
   */
  add(id: OrderId): void {
    this.assertCanAdd(this.lookup(id));
    this.list.append(id, id);
  }

  /**
   * Remove by id in O(1). The cursor moves on if it pointed at the removed order.
   */
  remove(id: OrderId): boolean {
    return this.list.remove(id) !== undefined;
  }

  has(id: OrderId): boolean {
    return this.list.has(id);
  }

  /**
   * Remove the focused order, returning its id
   */
  removeFocused(): OrderId | null {
    const id = this.list.currentKey();
    if (id === null) return null;
    this.list.remove(id);
    return id;
  }

  // ==========================================================================
  // Navigation
  // ==========================================================================

  focusedId(): OrderId | null {
    return this.list.currentKey();
  }

  focused(): Readonly<Order> | null {
    const id = this.list.currentKey();
    return id === null ? null : this.lookup(id);
  }

  next(): Readonly<Order> | null {
    const id = this.list.next();
    return id === null ? null : this.lookup(id);
  }

  previous(): Readonly<Order> | null {
    const id = this.list.previous();
    return id === null ? null : this.lookup(id);
  }

  focus(id: OrderId): boolean {
    return this.list.focus(id);
  }

  // ==========================================================================
  // Sorting
  // ==========================================================================

  /**
   * Reorder with a stable sort. The cursor stays on the same order.
   */
  sort(mode: SortMode, comparator: OrderComparator = SORT_COMPARATORS[mode]): void {
    const focusedId = this.list.currentKey();
    const sorted = mergeSort(this.list.values().map((id) => this.lookup(id)), comparator);

    this.list.clear();
    for (const order of sorted) {
      this.list.append(order.id, order.id);
    }
    if (focusedId !== null) {
      this.list.focus(focusedId);
    }
    this.mode = mode;
  }

  cycleSortMode(): SortMode {
    const mode = nextSortMode(this.mode);
    this.sort(mode);
    return mode;
  }

  // ==========================================================================
  // Views / restore
  // ==========================================================================

  ids(): OrderId[] {
    return this.list.values();
  }

  orders(): Readonly<Order>[] {
    return this.list.values().map((id) => this.lookup(id));
  }

  /**
   * Rebuild exactly as captured. Capacity is not re-checked: the captured state was valid.
   */
  restore(ids: readonly OrderId[], focusedId: OrderId | null, mode: SortMode): void {
    this.list.clear();
    for (const id of ids) {
      this.list.append(id, id);
    }
    if (focusedId !== null) {
      this.list.focus(focusedId);
    }
    this.mode = mode;
  }
}
