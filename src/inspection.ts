/**
 * Monitor notifications as a stream of timestamped inspection events, delivered to an
 * optional {@link Inspector} service.
 *
 * @module
 */
import { Clock, Context, Effect, Option } from "effect";

import type { EventMonitor } from "./event-monitor.js";
import type { MethodInstance, StateInstance, TransitionInstance } from "./live.js";

/**
 * Event emitted when an event is sent to a machine
 */
export interface EventSentEvent {
  readonly type: "@monitor.sent";
  readonly machine: string;
  readonly event: MethodInstance;
  readonly timestamp: number;
}

/**
 * Event emitted when a machine has completely handled an event
 */
export interface EventHandledEvent {
  readonly type: "@monitor.handled";
  readonly machine: string;
  readonly event: MethodInstance;
  readonly timestamp: number;
}

/**
 * Event emitted when a transition or change-state occurs
 */
export interface TransitionEvent {
  readonly type: "@monitor.transition";
  readonly machine: string;
  readonly transition: TransitionInstance;
  readonly timestamp: number;
}

/**
 * Any notification forwarded to an inspector
 */
export type InspectionEvent = EventSentEvent | EventHandledEvent | TransitionEvent;

/**
 * Receives every notification of the monitors it is attached to
 */
export interface Inspector {
  readonly onInspect: (event: InspectionEvent) => void;
}

/**
 * Optional service; {@link inspect} attaches it when present
 */
export const Inspector = Context.GenericTag<Inspector>("@hsm-runtime/Inspector");

/**
 * Inspector from a plain callback
 */
export const makeInspector = (onInspect: (event: InspectionEvent) => void): Inspector => ({
  onInspect,
});

// ============================================================================
// Wiring
// ============================================================================

/**
 * Forward every notification of `monitor` to `inspector`, stamped with `clock`.
 * Returns a function that detaches the inspector.
 */
export const attachInspector = <S extends StateInstance>(
  monitor: EventMonitor<S>,
  machine: string,
  inspector: Inspector,
  clock: Clock.Clock = Clock.make(),
): (() => void) => {
  const detachers = [
    monitor.addEventSentCallback((event) =>
      inspector.onInspect({
        type: "@monitor.sent",
        machine,
        event,
        timestamp: clock.unsafeCurrentTimeMillis(),
      }),
    ),
    monitor.addEventHandledCallback((event) =>
      inspector.onInspect({
        type: "@monitor.handled",
        machine,
        event,
        timestamp: clock.unsafeCurrentTimeMillis(),
      }),
    ),
    monitor.addTransitionCallback((transition) =>
      inspector.onInspect({
        type: "@monitor.transition",
        machine,
        transition,
        timestamp: clock.unsafeCurrentTimeMillis(),
      }),
    ),
  ];
  return () => {
    for (const detach of detachers) detach();
  };
};

/**
 * Attach the {@link Inspector} service from context, if one is provided, using the
 * context's clock. Succeeds with the detach function (a no-op without an inspector).
 */
export const inspect = <S extends StateInstance>(
  monitor: EventMonitor<S>,
  machine: string,
): Effect.Effect<() => void> =>
  Effect.gen(function* () {
    const inspector = yield* Effect.serviceOption(Inspector);
    if (Option.isNone(inspector)) return () => {};
    const clock = yield* Effect.clock;
    return attachInspector(monitor, machine, inspector.value, clock);
  });

/**
 * Prints one console line per notification: `[Machine] sent e`, `[Machine] A->B (#3)`
 */
export const consoleInspector = (): Inspector =>
  makeInspector((event) => {
    const prefix = `[${event.machine}]`;
    switch (event.type) {
      case "@monitor.sent":
        console.log(prefix, "sent", event.event.info.name);
        break;
      case "@monitor.handled": {
        const result = event.event.returnValue();
        if (Option.isSome(result)) {
          console.log(prefix, "handled", event.event.info.name, "→", result.value.value);
        } else {
          console.log(prefix, "handled", event.event.info.name);
        }
        break;
      }
      case "@monitor.transition":
        console.log(prefix, event.transition.toString(), `(#${event.transition.id})`);
        break;
    }
  });

/**
 * Appends every event to `events`
 */
export const collectingInspector = (events: InspectionEvent[]): Inspector =>
  makeInspector((event) => {
    events.push(event);
  });
