import type { EventMonitor } from "./event-monitor.js";
import { AssertionError } from "./errors.js";
import type { StateInstance } from "./live.js";

/**
 * Tape of notifications recorded from a monitor.
 *
 * `sent` and `handled` hold event names, `transitions` hold `Old->New` / `Old->>New`
 * strings. `timeline` interleaves all three, prefixing events with `>` (sent) or
 * `<` (handled).
 */
export interface NotificationRecorder {
  readonly sent: ReadonlyArray<string>;
  readonly handled: ReadonlyArray<string>;
  readonly transitions: ReadonlyArray<string>;
  readonly timeline: ReadonlyArray<string>;
  readonly clear: () => void;
  /** Unregister the recorder's callbacks */
  readonly stop: () => void;
}

/**
 * Record every notification `monitor` emits from now on.
 *
 * @example
 * ```ts
 * const tape = recordNotifications(machine.eventMonitor())
 * machine.transit()
 * expect(tape.sent).toEqual(["transit", "A:<", "B:>"])
 * ```
 */
export const recordNotifications = <S extends StateInstance>(
  monitor: EventMonitor<S>,
): NotificationRecorder => {
  const sent: string[] = [];
  const handled: string[] = [];
  const transitions: string[] = [];
  const timeline: string[] = [];

  const detachers = [
    monitor.addEventSentCallback((event) => {
      sent.push(event.info.name);
      timeline.push(`>${event.info.name}`);
    }),
    monitor.addEventHandledCallback((event) => {
      handled.push(event.info.name);
      timeline.push(`<${event.info.name}`);
    }),
    monitor.addTransitionCallback((transition) => {
      transitions.push(transition.toString());
      timeline.push(transition.toString());
    }),
  ];

  return {
    sent,
    handled,
    transitions,
    timeline,
    clear: () => {
      sent.length = 0;
      handled.length = 0;
      transitions.length = 0;
      timeline.length = 0;
    },
    stop: () => {
      for (const detach of detachers) detach();
    },
  };
};

/**
 * Assert that `actual` matches `expected` exactly, position by position.
 * Throws {@link AssertionError} naming the first differing position.
 */
export const assertOrder = (
  actual: ReadonlyArray<string>,
  expected: ReadonlyArray<string>,
): void => {
  const describe = () => `Expected: ${expected.join(", ")}\nActual:   ${actual.join(", ")}`;

  for (let i = 0; i < Math.min(actual.length, expected.length); i++) {
    if (actual[i] !== expected[i]) {
      throw new AssertionError({
        message: `Order mismatch at position ${i}. Expected "${expected[i]}" but got "${actual[i]}".\n${describe()}`,
      });
    }
  }

  if (actual.length !== expected.length) {
    throw new AssertionError({
      message: `Length mismatch. Expected ${expected.length} entries but got ${actual.length}.\n${describe()}`,
    });
  }
};
