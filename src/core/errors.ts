/**
 * Error taxonomy
 *
 * validation  - rejected player action, reported back as a failed command
 * data        - bad external record, skipped while the rest of the batch loads
 * consistency - scheduler/registry desync, repaired internally
 */

import type { OrderId, OrderStatus } from './types.js';

export type ErrorCategory = 'validation' | 'data' | 'consistency';

export abstract class GameError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// ============================================================================
// Validation
// ============================================================================

export abstract class ValidationError extends GameError {
  readonly category = 'validation' as const;
}

export class InvalidTransitionError extends ValidationError {
  readonly code = 'INVALID_TRANSITION';

  constructor(
    readonly orderId: OrderId,
    readonly from: OrderStatus,
    readonly to: OrderStatus
  ) {
    super(`Order ${orderId} cannot go from ${from} to ${to}`);
  }
}

export class InventoryFullError extends ValidationError {
  readonly code = 'INVENTORY_FULL';
}

export class EmptyHistoryError extends ValidationError {
  readonly code = 'EMPTY_HISTORY';

  constructor() {
    super('Nothing to undo');
  }
}

export class NotFoundError extends ValidationError {
  readonly code = 'NOT_FOUND';

  constructor(readonly orderId: OrderId) {
    super(`Order ${orderId} not found`);
  }
}

export class MoveBlockedError extends ValidationError {
  readonly code = 'MOVE_BLOCKED';
}

export class PlayerExhaustedError extends ValidationError {
  readonly code = 'PLAYER_EXHAUSTED';

  constructor() {
    super('Too exhausted to move');
  }
}

export class OutOfRangeError extends ValidationError {
  readonly code = 'OUT_OF_RANGE';
}

export class NoFocusedOrderError extends ValidationError {
  readonly code = 'NO_FOCUSED_ORDER';

  constructor() {
    super('No order selected in inventory');
  }
}

export class NoAvailableOrderError extends ValidationError {
  readonly code = 'NO_AVAILABLE_ORDER';

  constructor() {
    super('No orders available');
  }
}

export class GameOverError extends ValidationError {
  readonly code = 'GAME_OVER';

  constructor() {
    super('The game has ended');
  }
}

// ============================================================================
// Data
// ============================================================================

export abstract class DataError extends GameError {
  readonly category = 'data' as const;
}

export class MalformedRecordError extends DataError {
  readonly code = 'MALFORMED_RECORD';

  constructor(
    message: string,
    readonly index: number | null = null,
    readonly recordId: string | null = null
  ) {
    super(message);
  }
}

export class DuplicateIdError extends DataError {
  readonly code = 'DUPLICATE_ID';

  constructor(readonly orderId: OrderId) {
    super(`Order ${orderId} is already registered`);
  }
}

export class UnsupportedSaveError extends DataError {
  readonly code = 'UNSUPPORTED_SAVE';
}

// ============================================================================
// Consistency
// ============================================================================

export class ConsistencyError extends GameError {
  readonly category = 'consistency' as const;
  readonly code = 'CONSISTENCY';
}

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}
