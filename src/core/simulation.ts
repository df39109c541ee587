/**
 * Game Session
 * Composition root: owns every system and runs the tick in a fixed order
 *
 * Tick order: merge queued orders, weather, clock, registry release/expiry,
 * stamina recovery, queued commands, end-of-game check.
 */

import type {
  Direction,
  EndReason,
  GameConfig,
  Order,
  OrderId,
  OrderProgress,
  OrderSpec,
  OrderTransition,
  PlayerState,
  ScoreBreakdown,
  SessionStatus,
  SortMode,
  WeatherConfig,
} from './types.js';
import { DIRECTION_DELTAS } from './types.js';
import { SeededRNG, hashState } from './rng.js';
import { resolveConfig, type ConfigOverrides } from './world.js';
import {
  GameOverError,
  InvalidTransitionError,
  MoveBlockedError,
  NoAvailableOrderError,
  NoFocusedOrderError,
  OutOfRangeError,
  PlayerExhaustedError,
  ValidationError,
  type DataError,
} from './errors.js';

import { CityMap, manhattan, type CityData } from '../systems/city.js';
import { OrderRegistry, isTerminal, progressOf } from '../systems/orders.js';
import { AvailabilityScheduler } from '../systems/scheduler.js';
import { Inventory } from '../systems/inventory.js';
import { WeatherEngine, DEFAULT_WEATHER_CONFIG, type WeatherState, type WeatherView } from '../systems/weather.js';
import { HistoryManager, type CapturedState, type SerializedSnapshot } from '../systems/history.js';
import {
  applyMove,
  canMove,
  classifyStamina,
  createPlayer,
  moveCost,
  recoverStamina,
  registerCancellation,
  registerDelivery,
  registerExpiry,
} from '../systems/player.js';
import { computeScore } from '../systems/scoring.js';

// ============================================================================
// Commands
// ============================================================================

export type Command =
  | { type: 'move'; direction: Direction }
  | { type: 'openInventoryMenu' }
  | { type: 'accept' }
  | { type: 'cancel' }
  | { type: 'pickup' }
  | { type: 'deliver' }
  | { type: 'undo' }
  | { type: 'cycleSortMode' }
  | { type: 'navigate'; direction: 'next' | 'prev' };

export type CommandDetails = Record<string, string | number | boolean | null>;

export interface CommandResult {
  command: Command['type'];
  ok: boolean;
  error?: string;
  code?: string;
  details?: CommandDetails;
}

// ============================================================================
// Session data
// ============================================================================

export interface SessionData {
  city: CityData;
  jobs: readonly OrderSpec[];
  weather?: WeatherConfig;
}

export interface TickMetrics {
  tick: number;
  time: number;
  registered: OrderId[];
  released: OrderId[];
  expired: OrderId[];
  commands: CommandResult[];
  status: SessionStatus;
  stateHash: string;
}

export type SavedOrder = OrderSpec & OrderProgress;

/**
 * Complete mutable state of a session, as written by the serializer
 */
export interface SessionState {
  tick: number;
  elapsed: number;
  status: SessionStatus;
  endReason: EndReason | null;
  player: PlayerState;
  orders: SavedOrder[];
  pendingOrders: OrderSpec[];
  scheduler: { queued: OrderId[]; sequence: number; sequences: Array<[OrderId, number]> };
  inventory: { ids: OrderId[]; focusedId: OrderId | null; sortMode: SortMode };
  weather: WeatherState;
  history: SerializedSnapshot[];
  score: ScoreBreakdown | null;
}

/**
 * Game Session
 */
export class GameSession {
  readonly config: GameConfig;
  readonly city: CityMap;
  readonly registry: OrderRegistry;
  readonly scheduler: AvailabilityScheduler;
  readonly inventory: Inventory;
  readonly weather: WeatherEngine;
  readonly history: HistoryManager;
  readonly loadErrors: DataError[];

  private readonly weatherConfig: WeatherConfig;
  private player: PlayerState;
  private elapsed = 0;
  private tickCount = 0;
  private status: SessionStatus = 'playing';
  private endReason: EndReason | null = null;
  private score: ScoreBreakdown | null = null;
  private pendingOrders: OrderSpec[] = [];
  private commandQueue: Command[] = [];
  private tickHistory: string[] = []; // state hashes for determinism verification

  constructor(data: SessionData, overrides: ConfigOverrides = {}) {
    this.config = resolveConfig(overrides);
    const debug = this.config.debug;

    this.city = new CityMap(data.city);
    this.registry = new OrderRegistry({ isValidPosition: (p) => this.city.isValidPosition(p), debug });
    this.scheduler = new AvailabilityScheduler(this.registry, { debug });
    this.scheduler.attach();
    this.inventory = new Inventory((id) => this.registry.get(id), this.config.inventory);

    this.weatherConfig = data.weather ?? DEFAULT_WEATHER_CONFIG;
    this.weather = new WeatherEngine(this.weatherConfig, this.config.weather, new SeededRNG(this.config.seed), {
      debug,
    });

    this.player = createPlayer(this.config);
    this.history = new HistoryManager(
      this.registry,
      {
        captureState: () => this.captureState(),
        restoreState: (state) => this.restoreState(state),
        now: () => this.elapsed,
      },
      { depth: this.config.historyDepth, debug }
    );

    this.registry.subscribe((t) => this.onOrderTransition(t));
    this.loadErrors = this.registry.registerAll(data.jobs, 0).errors;

    if (debug) {
      console.log(
        `[Session] ${this.city.name} ${this.city.width}x${this.city.height}, ${this.registry.size} orders, goal $${this.goal}`
      );
    }
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  get goal(): number {
    return this.config.goal ?? this.city.goal;
  }

  getPlayer(): Readonly<PlayerState> {
    return this.player;
  }

  getElapsed(): number {
    return this.elapsed;
  }

  getTick(): number {
    return this.tickCount;
  }

  getStatus(): SessionStatus {
    return this.status;
  }

  getEndReason(): EndReason | null {
    return this.endReason;
  }

  getScore(): ScoreBreakdown | null {
    return this.score;
  }

  getWeatherConfig(): WeatherConfig {
    return this.weatherConfig;
  }

  getTickHistory(): string[] {
    return [...this.tickHistory];
  }

  // ==========================================================================
  // Tick
  // ==========================================================================

  /**
   * Buffer incoming orders; they are registered at the start of the next tick
   */
  queueOrders(specs: readonly OrderSpec[]): void {
    this.pendingOrders.push(...specs.map((s) => ({ ...s, pickup: { ...s.pickup }, dropoff: { ...s.dropoff } })));
  }

  /**
   * Defer a command to the next tick, after release and expiry have run
   */
  enqueue(command: Command): void {
    this.commandQueue.push(command);
  }

  tick(dt: number = 1): TickMetrics {
    const metrics: TickMetrics = {
      tick: this.tickCount,
      time: this.elapsed,
      registered: [],
      released: [],
      expired: [],
      commands: [],
      status: this.status,
      stateHash: '',
    };

    if (this.status === 'playing') {
      // 1. Merge orders that arrived since the last tick
      const incoming = this.pendingOrders;
      this.pendingOrders = [];
      metrics.registered = this.registry.registerAll(incoming, this.elapsed).registered;

      // 2. Weather
      this.weather.tick(dt);

      // 3. Clock, then release and expiry
      this.elapsed += dt;
      const { released, expired } = this.registry.tick(this.elapsed);
      metrics.released = released;
      metrics.expired = expired;

      // 4. Idle stamina recovery
      this.player = recoverStamina(this.player, dt, this.elapsed, this.config);

      // 5. Player commands, in arrival order
      const commands = this.commandQueue;
      this.commandQueue = [];
      metrics.commands = commands.map((c) => this.dispatch(c));

      // 6. End of game
      this.checkEnd();
    } else {
      metrics.commands = this.commandQueue.splice(0).map((c) => this.reject(c, new GameOverError()));
    }

    this.tickCount++;
    metrics.time = this.elapsed;
    metrics.status = this.status;
    metrics.stateHash = this.hash();
    this.tickHistory.push(metrics.stateHash);

    return metrics;
  }

  /**
   * Run N ticks
   */
  run(ticks: number, dt: number = 1): TickMetrics[] {
    const all: TickMetrics[] = [];
    for (let i = 0; i < ticks && this.status === 'playing'; i++) {
      all.push(this.tick(dt));
    }
    return all;
  }

  private checkEnd(): void {
    if (this.status !== 'playing') return;

    if (this.player.earnings >= this.goal) {
      this.finish('victory', 'goal_reached');
    } else if (this.player.reputation < this.config.reputationLoseThreshold) {
      this.finish('defeat', 'reputation');
    } else if (this.elapsed >= this.config.gameDuration) {
      this.finish('defeat', 'timeout');
    }
  }

  private finish(status: SessionStatus, reason: EndReason): void {
    this.status = status;
    this.endReason = reason;
    this.score = computeScore(
      {
        orders: this.registry.list(),
        reputation: this.player.reputation,
        completionTime: this.elapsed,
        duration: this.config.gameDuration,
      },
      this.config.scoring
    );

    if (this.config.debug) {
      console.log(
        `[Session] ${status} (${reason}) at t=${this.elapsed.toFixed(1)}: score ${this.score.finalScore.toFixed(0)}`
      );
    }
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  /**
   * Validate and apply a command now. Validation failures come back as ok: false.
   */
  dispatch(command: Command): CommandResult {
    if (this.status !== 'playing') {
      return this.reject(command, new GameOverError());
    }

    try {
      const details = this.apply(command);
      this.checkEnd();
      return { command: command.type, ok: true, details };
    } catch (error) {
      if (error instanceof ValidationError) {
        if (this.config.debug) {
          console.log(`[Session] ${command.type} rejected: ${error.message}`);
        }
        return this.reject(command, error);
      }
      throw error;
    }
  }

  private reject(command: Command, error: ValidationError): CommandResult {
    return { command: command.type, ok: false, error: error.message, code: error.code };
  }

  private apply(command: Command): CommandDetails {
    switch (command.type) {
      case 'move':
        return this.move(command.direction);
      case 'openInventoryMenu':
        return this.inventoryMenu();
      case 'accept':
        return this.accept();
      case 'cancel':
        return this.cancel();
      case 'pickup':
        return this.pickup();
      case 'deliver':
        return this.deliver();
      case 'undo':
        return { label: this.history.undo().label };
      case 'cycleSortMode': {
        const sortMode = this.history.recordBefore('sort', () => this.inventory.cycleSortMode());
        return { sortMode, focusedId: this.inventory.focusedId() };
      }
      case 'navigate': {
        const moved = command.direction === 'next' ? this.inventory.next() : this.inventory.previous();
        return { moved: moved !== null, focusedId: this.inventory.focusedId() };
      }
    }
  }

  private move(direction: Direction): CommandDetails {
    const delta = DIRECTION_DELTAS[direction];
    const target = { x: this.player.position.x + delta.x, y: this.player.position.y + delta.y };

    if (!canMove(this.player)) {
      throw new PlayerExhaustedError();
    }
    if (!this.city.isWalkable(target)) {
      throw new MoveBlockedError(`Cannot move ${direction} to (${target.x},${target.y})`);
    }

    const carriedWeight = this.inventory.currentWeight();
    const cost = moveCost(carriedWeight, this.weather.staminaPenalty(), this.config);

    this.history.recordBefore('move', () => {
      this.player = applyMove(
        this.player,
        target,
        cost,
        {
          weatherMultiplier: this.weather.currentMultiplier(),
          surfaceWeight: this.city.surfaceWeight(target),
          carriedWeight,
        },
        this.elapsed,
        this.config
      );
    });

    return { x: target.x, y: target.y, stamina: this.player.stamina, cost };
  }

  private inventoryMenu(): CommandDetails {
    return {
      count: this.inventory.count,
      weight: this.inventory.currentWeight(),
      focusedId: this.inventory.focusedId(),
      sortMode: this.inventory.sortMode,
      available: this.scheduler.size,
    };
  }

  private accept(): CommandDetails {
    const order = this.scheduler.peek();
    if (!order) {
      throw new NoAvailableOrderError();
    }
    this.inventory.assertCanAdd(order);

    this.history.recordBefore(`accept ${order.id}`, () => {
      this.scheduler.pop();
      this.registry.transition(order.id, 'accepted', this.elapsed);
      this.inventory.add(order.id);
      this.inventory.focus(order.id);
    });

    return { orderId: order.id, payout: order.payout, deadline: order.deadline };
  }

  private requireFocused(): Readonly<Order> {
    const order = this.inventory.focused();
    if (!order) {
      throw new NoFocusedOrderError();
    }
    return order;
  }

  private pickup(): CommandDetails {
    const order = this.requireFocused();
    if (order.status !== 'accepted') {
      throw new InvalidTransitionError(order.id, order.status, 'picked_up');
    }
    this.requireInRange(order.pickup, 'pickup', order.id);

    this.history.recordBefore(`pickup ${order.id}`, () => {
      this.registry.transition(order.id, 'picked_up', this.elapsed);
    });

    return { orderId: order.id };
  }

  private deliver(): CommandDetails {
    const order = this.requireFocused();
    if (order.status !== 'picked_up') {
      throw new InvalidTransitionError(order.id, order.status, 'delivered');
    }
    this.requireInRange(order.dropoff, 'dropoff', order.id);

    const outcome = registerDelivery(this.player, order, this.elapsed, this.config);
    this.history.recordBefore(`deliver ${order.id}`, () => {
      this.registry.transition(order.id, 'delivered', this.elapsed);
      this.player = outcome.player;
    });

    return {
      orderId: order.id,
      credited: outcome.credited,
      early: outcome.early,
      reputationDelta: outcome.reputationDelta,
    };
  }

  private cancel(): CommandDetails {
    const order = this.requireFocused();
    if (order.status !== 'accepted' && order.status !== 'picked_up') {
      throw new InvalidTransitionError(order.id, order.status, 'cancelled');
    }

    this.history.recordBefore(`cancel ${order.id}`, () => {
      this.registry.transition(order.id, 'cancelled', this.elapsed);
      this.player = registerCancellation(this.player);
    });

    return { orderId: order.id, reputation: this.player.reputation };
  }

  private requireInRange(point: { x: number; y: number }, what: string, id: OrderId): void {
    const distance = manhattan(this.player.position, point);
    if (distance > this.config.interactionRadius) {
      throw new OutOfRangeError(`Order ${id} ${what} is ${distance} cells away`);
    }
  }

  // ==========================================================================
  // Registry events
  // ==========================================================================

  /**
   * Orders leave the inventory when they reach a terminal state. A carried order
   * expiring costs reputation.
   */
  private onOrderTransition(transition: OrderTransition): void {
    if (!isTerminal(transition.to) || !this.inventory.has(transition.orderId)) return;

    this.inventory.remove(transition.orderId);
    if (transition.to === 'expired' && transition.cause === 'tick') {
      this.player = registerExpiry(this.player);
      if (this.config.debug) {
        console.log(`[Session] Carried order ${transition.orderId} expired, reputation ${this.player.reputation}`);
      }
    }
  }

  // ==========================================================================
  // Undo support
  // ==========================================================================

  private captureState(): CapturedState {
    return {
      time: this.elapsed,
      player: { ...this.player, position: { ...this.player.position } },
      inventory: {
        entries: this.inventory.ids().map((id) => ({ id, status: this.registry.get(id).status })),
        focusedId: this.inventory.focusedId(),
        sortMode: this.inventory.sortMode,
      },
    };
  }

  private restoreState(state: Readonly<CapturedState>): void {
    this.player = { ...state.player, position: { ...state.player.position } };
    this.inventory.restore(
      state.inventory.entries.map((e) => e.id),
      state.inventory.focusedId,
      state.inventory.sortMode
    );
  }

  // ==========================================================================
  // Views
  // ==========================================================================

  getSummary(): {
    tick: number;
    time: number;
    status: SessionStatus;
    endReason: EndReason | null;
    goal: number;
    player: {
      position: { x: number; y: number };
      stamina: number;
      condition: string;
      earnings: number;
      reputation: number;
    };
    weather: WeatherView;
    orders: Record<string, number>;
    inventory: { ids: OrderId[]; focusedId: OrderId | null; sortMode: SortMode; weight: number };
    available: number;
    undoDepth: number;
    score: ScoreBreakdown | null;
  } {
    return {
      tick: this.tickCount,
      time: this.elapsed,
      status: this.status,
      endReason: this.endReason,
      goal: this.goal,
      player: {
        position: { ...this.player.position },
        stamina: Math.round(this.player.stamina * 10) / 10,
        condition: classifyStamina(this.player.stamina, this.config),
        earnings: Math.round(this.player.earnings * 100) / 100,
        reputation: this.player.reputation,
      },
      weather: this.weather.view(),
      orders: this.registry.countByStatus(),
      inventory: {
        ids: this.inventory.ids(),
        focusedId: this.inventory.focusedId(),
        sortMode: this.inventory.sortMode,
        weight: this.inventory.currentWeight(),
      },
      available: this.scheduler.size,
      undoDepth: this.history.size,
      score: this.score,
    };
  }

  /**
   * Hash of everything the simulation evolves
   */
  hash(): string {
    return hashState({
      elapsed: this.elapsed,
      status: this.status,
      player: this.player,
      orders: this.registry.list().map((o) => [o.id, progressOf(o)]),
      inventory: [this.inventory.ids(), this.inventory.focusedId(), this.inventory.sortMode],
      weather: this.weather.getState(),
      history: this.history.serialize(),
    });
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  exportState(): SessionState {
    return {
      tick: this.tickCount,
      elapsed: this.elapsed,
      status: this.status,
      endReason: this.endReason,
      player: { ...this.player, position: { ...this.player.position } },
      orders: this.registry.list().map((o) => ({
        id: o.id,
        pickup: { ...o.pickup },
        dropoff: { ...o.dropoff },
        payout: o.payout,
        deadline: o.deadline,
        priority: o.priority,
        weight: o.weight,
        releaseTime: o.releaseTime,
        ...progressOf(o),
      })),
      pendingOrders: this.pendingOrders.map((s) => ({ ...s })),
      scheduler: {
        queued: this.scheduler.queuedIds(),
        sequence: this.scheduler.getSequenceCounter(),
        sequences: this.scheduler.getSequences(),
      },
      inventory: {
        ids: this.inventory.ids(),
        focusedId: this.inventory.focusedId(),
        sortMode: this.inventory.sortMode,
      },
      weather: this.weather.getState(),
      history: this.history.serialize(),
      score: this.score ? { ...this.score } : null,
    };
  }

  /**
   * Load saved state into a freshly constructed session with no orders
   */
  importState(state: SessionState): void {
    this.elapsed = state.elapsed;
    this.tickCount = state.tick;

    for (const saved of state.orders) {
      const { status, acceptedAt, pickedUpAt, resolvedAt, ...spec } = saved;
      this.registry.register(spec, state.elapsed);
      this.registry.restore(spec.id, { status, acceptedAt, pickedUpAt, resolvedAt }, state.elapsed);
    }

    this.scheduler.rebuild(state.scheduler.queued, state.scheduler.sequence, state.scheduler.sequences);
    this.inventory.restore(state.inventory.ids, state.inventory.focusedId, state.inventory.sortMode);
    this.weather.setState(state.weather);
    this.history.deserialize(state.history);
    this.player = { ...state.player, position: { ...state.player.position } };
    this.pendingOrders = state.pendingOrders.map((s) => ({ ...s }));
    this.commandQueue = [];
    this.status = state.status;
    this.endReason = state.endReason;
    this.score = state.score ? { ...state.score } : null;
    this.tickHistory = [];
  }
}
