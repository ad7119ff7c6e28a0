/**
 * The event monitor keeps a history of handled events and completed transitions for
 * one machine instance, and invokes registered callbacks whenever an event is sent,
 * an event is handled, or a transition occurs.
 *
 * Notification order for a `Transition` caused by event `E`, from `Old` to `New`:
 *
 * 1. sent `E`
 * 2. sent `Old:<`, exit handler runs (may cascade), handled `Old:<`
 * 3. current state becomes `New`
 * 4. transition `Old->New`
 * 5. sent `New:>`, enter handler runs (may cascade), handled `New:>`
 * 6. handled `E`
 *
 * A `ChangeState` is sent `E`, swap, transition, handled `E`. Sent notifications
 * therefore follow causal order, handled notifications follow stack-unwind order.
 *
 * Callbacks run synchronously, in registration order, before the notifying call
 * returns. Exceptions thrown by a callback propagate to the dispatching code.
 *
 * @module
 */
import { Effect, Option } from "effect";

import type { MethodInstance, StateInstance, TransitionInstance } from "./live.js";

/** Invoked with each sent or handled event */
export type EventCallback = (event: MethodInstance) => void;

/** Invoked with each transition */
export type TransitionCallback<S extends StateInstance = StateInstance> = (
  transition: TransitionInstance<S>,
) => void;

/**
 * History capacity: `none` keeps everything, `some(0)` records nothing.
 */
export type Capacity = Option.Option<number>;

export interface EventMonitorOptions {
  readonly eventHistoryCapacity?: Capacity;
  readonly transitionHistoryCapacity?: Capacity;
}

/** Capacities used when none are given: no event history, the last transition only */
export const DEFAULT_EVENT_HISTORY_CAPACITY: Capacity = Option.some(0);
export const DEFAULT_TRANSITION_HISTORY_CAPACITY: Capacity = Option.some(1);

/** `some(Infinity)` means unbounded; other invalid values are clamped and logged */
const normalize = (capacity: Capacity, history: string): Capacity =>
  Option.flatMap(capacity, (n): Capacity => {
    if (n === Number.POSITIVE_INFINITY) return Option.none();
    if (Number.isInteger(n) && n >= 0) return Option.some(n);
    const clamped = Number.isNaN(n) ? 0 : Math.max(0, Math.floor(n));
    Effect.runSync(
      Effect.logWarning(`Invalid ${history} history capacity ${n}, using ${clamped}`),
    );
    return Option.some(clamped);
  });

/** Each registration gets its own entry, so an unsubscribe removes only that one */
interface Registration<F> {
  readonly callback: F;
}

const register = <F>(
  list: ReadonlyArray<Registration<F>>,
  callback: F,
): [ReadonlyArray<Registration<F>>, Registration<F>] => {
  const entry: Registration<F> = { callback };
  return [[...list, entry], entry];
};

/** Append with FIFO eviction; a capacity of 0 stores nothing */
const pushBounded = <A>(items: A[], capacity: Capacity, item: A): void => {
  if (Option.isNone(capacity)) {
    items.push(item);
    return;
  }
  if (capacity.value === 0) return;
  items.push(item);
  trim(items, capacity);
};

/** Drop oldest entries until within capacity */
const trim = <A>(items: A[], capacity: Capacity): void => {
  if (Option.isNone(capacity)) return;
  const excess = items.length - capacity.value;
  if (excess > 0) items.splice(0, excess);
};

export class EventMonitor<S extends StateInstance = StateInstance> {
  private eventCapacity: Capacity;
  private transitionCapacity: Capacity;
  private readonly events: MethodInstance[] = [];
  private readonly transitions: TransitionInstance<S>[] = [];
  // Replaced, never mutated, so a notification in progress iterates a stable list
  private eventSentCallbacks: ReadonlyArray<Registration<EventCallback>> = [];
  private eventHandledCallbacks: ReadonlyArray<Registration<EventCallback>> = [];
  private transitionCallbacks: ReadonlyArray<Registration<TransitionCallback<S>>> = [];

  constructor(
    eventCapacity: Capacity = Option.none(),
    transitionCapacity: Capacity = Option.none(),
  ) {
    this.eventCapacity = normalize(eventCapacity, "event");
    this.transitionCapacity = normalize(transitionCapacity, "transition");
  }

  /**
   * Monitor with the given capacities; omitted ones take the defaults.
   */
  static make<S extends StateInstance = StateInstance>(
    options: EventMonitorOptions = {},
  ): EventMonitor<S> {
    return new EventMonitor<S>(
      options.eventHistoryCapacity ?? DEFAULT_EVENT_HISTORY_CAPACITY,
      options.transitionHistoryCapacity ?? DEFAULT_TRANSITION_HISTORY_CAPACITY,
    );
  }

  static default<S extends StateInstance = StateInstance>(): EventMonitor<S> {
    return EventMonitor.make<S>();
  }

  // ==========================================================================
  // Callback registration
  // ==========================================================================

  /**
   * Register a callback invoked when an event is sent, before it is handled.
   * For a transition the order is: triggering event, exit of the old state, enter of
   * the new state. Returns a function that unregisters the callback.
   */
  addEventSentCallback(callback: EventCallback): () => void {
    const [callbacks, entry] = register(this.eventSentCallbacks, callback);
    this.eventSentCallbacks = callbacks;
    return () => {
      this.eventSentCallbacks = this.eventSentCallbacks.filter((r) => r !== entry);
    };
  }

  /**
   * Register a callback invoked once an event is completely handled, with its return
   * value set. For a transition the order is: exit of the old state, enter of the new
   * state, triggering event.
   */
  addEventHandledCallback(callback: EventCallback): () => void {
    const [callbacks, entry] = register(this.eventHandledCallbacks, callback);
    this.eventHandledCallbacks = callbacks;
    return () => {
      this.eventHandledCallbacks = this.eventHandledCallbacks.filter((r) => r !== entry);
    };
  }

  /**
   * Register a callback invoked on each transition, after the exit event is handled
   * and before the enter event is sent.
   */
  addTransitionCallback(callback: TransitionCallback<S>): () => void {
    const [callbacks, entry] = register(this.transitionCallbacks, callback);
    this.transitionCallbacks = callbacks;
    return () => {
      this.transitionCallbacks = this.transitionCallbacks.filter((r) => r !== entry);
    };
  }

  // ==========================================================================
  // Notifications (called by the machine runtime)
  // ==========================================================================

  /** Invoke event-sent callbacks. The event enters the history only once handled. */
  eventSent(event: MethodInstance): void {
    for (const { callback } of this.eventSentCallbacks) {
      callback(event);
    }
  }

  /** Record a handled event, then invoke event-handled callbacks. */
  eventHandled(event: MethodInstance): void {
    pushBounded(this.events, this.eventCapacity, event);
    for (const { callback } of this.eventHandledCallbacks) {
      callback(event);
    }
  }

  /** Record a transition, then invoke transition callbacks. */
  transitionOccurred(transition: TransitionInstance<S>): void {
    pushBounded(this.transitions, this.transitionCapacity, transition);
    for (const { callback } of this.transitionCallbacks) {
      callback(transition);
    }
  }

  // ==========================================================================
  // History
  // ==========================================================================

  /** Handled events, oldest first */
  eventHistory(): ReadonlyArray<MethodInstance> {
    return [...this.events];
  }

  /** Transitions, oldest first */
  transitionHistory(): ReadonlyArray<TransitionInstance<S>> {
    return [...this.transitions];
  }

  clearEventHistory(): void {
    this.events.length = 0;
  }

  clearTransitionHistory(): void {
    this.transitions.length = 0;
  }

  get eventHistoryCapacity(): Capacity {
    return this.eventCapacity;
  }

  get transitionHistoryCapacity(): Capacity {
    return this.transitionCapacity;
  }

  /** Lowering the capacity evicts the oldest events immediately; raising never evicts. */
  setEventHistoryCapacity(capacity: Capacity): void {
    this.eventCapacity = normalize(capacity, "event");
    trim(this.events, this.eventCapacity);
  }

  /** Lowering the capacity evicts the oldest transitions immediately; raising never evicts. */
  setTransitionHistoryCapacity(capacity: Capacity): void {
    this.transitionCapacity = normalize(capacity, "transition");
    trim(this.transitions, this.transitionCapacity);
  }

  /**
   * Most recent transition. None if the machine has not transitioned since the history
   * was last cleared, or if the transition history capacity is 0.
   */
  lastTransition(): Option.Option<TransitionInstance<S>> {
    return Option.fromNullable(this.transitions[this.transitions.length - 1]);
  }
}
