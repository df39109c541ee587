/**
 * Order Registry
 * Canonical store of orders and the only owner of their lifecycle state
 */

import type {
  Order,
  OrderId,
  OrderListener,
  OrderProgress,
  OrderSpec,
  OrderStatus,
  OrderTransition,
  TransitionCause,
  GridPoint,
} from '../core/types.js';
import {
  DuplicateIdError,
  InvalidTransitionError,
  MalformedRecordError,
  NotFoundError,
} from '../core/errors.js';

/**
 * Legal edges of the order state machine.
 * Terminal states have no outgoing edges; only undo restores a prior state.
 */
export const ORDER_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  pending_release: ['available', 'expired'],
  available: ['accepted', 'cancelled', 'expired'],
  accepted: ['picked_up', 'cancelled', 'expired'],
  picked_up: ['delivered', 'cancelled', 'expired'],
  delivered: [],
  cancelled: [],
  expired: [],
};

const TERMINAL_STATUSES: ReadonlySet<OrderStatus> = new Set(['delivered', 'cancelled', 'expired']);

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: OrderStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function progressOf(order: OrderProgress): OrderProgress {
  return {
    status: order.status,
    acceptedAt: order.acceptedAt,
    pickedUpAt: order.pickedUpAt,
    resolvedAt: order.resolvedAt,
  };
}

export interface RegistryTickResult {
  released: OrderId[];
  expired: OrderId[];
}

export interface OrderRegistryOptions {
  /** Coordinate check supplied by the city map */
  isValidPosition?: (point: GridPoint) => boolean;
  debug?: boolean;
}

/**
 * Order Registry
 * Orders are kept in registration order so tick processing is deterministic.
 */
export class OrderRegistry {
  private orders = new Map<OrderId, Order>();
  private listeners = new Set<OrderListener>();
  private readonly isValidPosition: (point: GridPoint) => boolean;
  private readonly debug: boolean;

  constructor(options: OrderRegistryOptions = {}) {
    this.isValidPosition = options.isValidPosition ?? (() => true);
    this.debug = options.debug ?? false;
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Insert a new order. It starts available if already released, otherwise pending.
   */
  register(spec: OrderSpec, currentTime: number): Readonly<Order> {
    if (this.orders.has(spec.id)) {
      throw new DuplicateIdError(spec.id);
    }
    if (!this.isValidPosition(spec.pickup)) {
      throw new MalformedRecordError(
        `Order ${spec.id} pickup (${spec.pickup.x},${spec.pickup.y}) is outside the city`,
        null,
        spec.id
      );
    }
    if (!this.isValidPosition(spec.dropoff)) {
      throw new MalformedRecordError(
        `Order ${spec.id} dropoff (${spec.dropoff.x},${spec.dropoff.y}) is outside the city`,
        null,
        spec.id
      );
    }

    const status: OrderStatus = spec.releaseTime <= currentTime ? 'available' : 'pending_release';
    const order: Order = {
      ...spec,
      pickup: { ...spec.pickup },
      dropoff: { ...spec.dropoff },
      status,
      acceptedAt: null,
      pickedUpAt: null,
      resolvedAt: null,
    };
    Object.freeze(order.pickup);
    Object.freeze(order.dropoff);

    this.orders.set(order.id, order);

    if (this.debug) {
      console.log(`[Orders] Registered ${order.id} as ${status} (priority ${order.priority})`);
    }

    if (status === 'available') {
      this.emit({
        orderId: order.id,
        from: 'pending_release',
        to: 'available',
        previous: { status: 'pending_release', acceptedAt: null, pickedUpAt: null, resolvedAt: null },
        time: currentTime,
        cause: 'register',
      });
    }

    return order;
  }

  /**
   * Insert a batch, collecting per-record failures instead of aborting.
   */
  registerAll(
    specs: readonly OrderSpec[],
    currentTime: number
  ): { registered: OrderId[]; errors: Array<DuplicateIdError | MalformedRecordError> } {
    const registered: OrderId[] = [];
    const errors: Array<DuplicateIdError | MalformedRecordError> = [];

    for (const spec of specs) {
      try {
        this.register(spec, currentTime);
        registered.push(spec.id);
      } catch (error) {
        if (error instanceof DuplicateIdError || error instanceof MalformedRecordError) {
          console.warn(`[Orders] Skipped record: ${error.message}`);
          errors.push(error);
          continue;
        }
        throw error;
      }
    }

    return { registered, errors };
  }

  // ==========================================================================
  // Automatic transitions
  // ==========================================================================

  /**
   * Release due orders and expire late ones.
   * Idempotent for a repeated currentTime: nothing is left to transition.
   */
  tick(currentTime: number): RegistryTickResult {
    const result: RegistryTickResult = { released: [], expired: [] };

    for (const order of this.orders.values()) {
      if (isTerminal(order.status)) continue;

      if (order.deadline < currentTime) {
        this.apply(order, 'expired', currentTime, 'tick');
        result.expired.push(order.id);
        continue;
      }

      if (order.status === 'pending_release' && order.releaseTime <= currentTime) {
        this.apply(order, 'available', currentTime, 'tick');
        result.released.push(order.id);
      }
    }

    if (this.debug && (result.released.length > 0 || result.expired.length > 0)) {
      console.log(
        `[Orders] t=${currentTime.toFixed(1)} released=[${result.released.join(',')}] expired=[${result.expired.join(',')}]`
      );
    }

    return result;
  }

  // ==========================================================================
  // Player-initiated transitions
  // ==========================================================================

  /**
   * Move an order along a legal edge. Illegal edges leave the order untouched.
   */
  transition(id: OrderId, target: OrderStatus, time: number): Readonly<Order> {
    const order = this.require(id);
    if (!canTransition(order.status, target)) {
      throw new InvalidTransitionError(id, order.status, target);
    }
    this.apply(order, target, time, 'action');
    return order;
  }

  /**
   * Overwrite progress wholesale. Reserved for undo, which bypasses the state machine.
   */
  restore(id: OrderId, progress: OrderProgress, time: number): void {
    const order = this.require(id);
    const previous = progressOf(order);
    if (
      previous.status === progress.status &&
      previous.acceptedAt === progress.acceptedAt &&
      previous.pickedUpAt === progress.pickedUpAt &&
      previous.resolvedAt === progress.resolvedAt
    ) {
      return;
    }

    order.status = progress.status;
    order.acceptedAt = progress.acceptedAt;
    order.pickedUpAt = progress.pickedUpAt;
    order.resolvedAt = progress.resolvedAt;

    this.emit({ orderId: id, from: previous.status, to: progress.status, previous, time, cause: 'restore' });
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  get(id: OrderId): Readonly<Order> {
    return this.require(id);
  }

  has(id: OrderId): boolean {
    return this.orders.has(id);
  }

  get size(): number {
    return this.orders.size;
  }

  list(status?: OrderStatus): Readonly<Order>[] {
    const all = Array.from(this.orders.values());
    return status ? all.filter((o) => o.status === status) : all;
  }

  countByStatus(): Record<OrderStatus, number> {
    const counts: Record<OrderStatus, number> = {
      pending_release: 0,
      available: 0,
      accepted: 0,
      picked_up: 0,
      delivered: 0,
      cancelled: 0,
      expired: 0,
    };
    for (const order of this.orders.values()) {
      counts[order.status]++;
    }
    return counts;
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  subscribe(listener: OrderListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(transition: OrderTransition): void {
    for (const listener of this.listeners) {
      listener(transition);
    }
  }

  private apply(order: Order, target: OrderStatus, time: number, cause: TransitionCause): void {
    const previous = progressOf(order);

    order.status = target;
    switch (target) {
      case 'accepted':
        order.acceptedAt = time;
        break;
      case 'picked_up':
        order.pickedUpAt = time;
        break;
      case 'delivered':
      case 'cancelled':
      case 'expired':
        order.resolvedAt = time;
        break;
    }

    this.emit({ orderId: order.id, from: previous.status, to: target, previous, time, cause });
  }

  private require(id: OrderId): Order {
    const order = this.orders.get(id);
    if (!order) {
      throw new NotFoundError(id);
    }
    return order;
  }
}
