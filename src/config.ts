/**
 * Default history capacities for new monitors, read through effect `Config`.
 *
 * | Key                                        | Default |
 * | ------------------------------------------ | ------- |
 * | `HSM_MONITOR_EVENT_HISTORY_CAPACITY`       | `0`     |
 * | `HSM_MONITOR_TRANSITION_HISTORY_CAPACITY`  | `1`     |
 *
 * Each accepts a non-negative integer or `unbounded`.
 *
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const monitor = yield* makeEventMonitor()
 *   // ...
 * }).pipe(Effect.provide(MonitorConfigDefault))
 * ```
 *
 * @module
 */
import { Config, Context, Effect, Layer, Option, Schema } from "effect";

import type { Capacity } from "./event-monitor.js";
import {
  DEFAULT_EVENT_HISTORY_CAPACITY,
  DEFAULT_TRANSITION_HISTORY_CAPACITY,
  EventMonitor,
} from "./event-monitor.js";
import type { StateInstance } from "./live.js";

export interface MonitorSettings {
  readonly eventHistoryCapacity: Capacity;
  readonly transitionHistoryCapacity: Capacity;
}

const CapacitySetting = Schema.Union(
  Schema.Literal("unbounded"),
  Schema.NumberFromString.pipe(Schema.int(), Schema.nonNegative()),
);

const capacity = (key: string, fallback: Capacity): Config.Config<Capacity> =>
  Schema.Config(key, CapacitySetting).pipe(
    Config.map((setting): Capacity => (setting === "unbounded" ? Option.none() : Option.some(setting))),
    Config.withDefault(fallback),
  );

export const monitorConfig: Config.Config<MonitorSettings> = Config.nested(
  Config.all({
    eventHistoryCapacity: capacity("EVENT_HISTORY_CAPACITY", DEFAULT_EVENT_HISTORY_CAPACITY),
    transitionHistoryCapacity: capacity(
      "TRANSITION_HISTORY_CAPACITY",
      DEFAULT_TRANSITION_HISTORY_CAPACITY,
    ),
  }),
  "HSM_MONITOR",
);

/**
 * Monitor settings service
 */
export const MonitorConfig = Context.GenericTag<MonitorSettings>("@hsm-runtime/MonitorConfig");

/** Settings loaded from the configured `ConfigProvider` */
export const Default = Layer.effect(MonitorConfig, monitorConfig);

/** Fixed settings */
export const layer = (settings: MonitorSettings): Layer.Layer<MonitorSettings> =>
  Layer.succeed(MonitorConfig, settings);

/**
 * Build a monitor from the {@link MonitorConfig} service.
 */
export const makeEventMonitor = <S extends StateInstance = StateInstance>(): Effect.Effect<
  EventMonitor<S>,
  never,
  MonitorSettings
> => Effect.map(MonitorConfig, (settings) => EventMonitor.make<S>(settings));
