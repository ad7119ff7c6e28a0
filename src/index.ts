// Static info model
export type {
  MachineInfo,
  MachineSpec,
  MethodInfo,
  MethodSpec,
  ParameterInfo,
  StateInfo,
  StateSpec,
  TargetSpec,
  TransitionInfo,
  TransitionKind,
  TransitionSpec,
} from "./info.js";
export {
  defineMachine,
  enterEventName,
  exitEventName,
  findHandler,
  isAncestor,
  isStackPop,
  targetState,
  TransitionTarget,
} from "./info.js";

// Environments (namespace) and values
export * as Environment from "./environment.js";
export type {
  Environment as EnvironmentType,
  KindType,
  Plain,
  ValueKind,
} from "./environment.js";
export { EMPTY, Value } from "./environment.js";

// Live instances
export type { MethodInstance, StateInstance } from "./live.js";
export { downcast, downcastTo, MethodCall, TransitionInstance } from "./live.js";

// State stack
export { StateStack } from "./state-stack.js";

// Event monitor
export type {
  Capacity,
  EventCallback,
  EventMonitorOptions,
  TransitionCallback,
} from "./event-monitor.js";
export {
  DEFAULT_EVENT_HISTORY_CAPACITY,
  DEFAULT_TRANSITION_HISTORY_CAPACITY,
  EventMonitor,
} from "./event-monitor.js";

// Generated-machine base class
export { MachineRuntime } from "./machine-runtime.js";

// Configuration
export type { MonitorSettings } from "./config.js";
export {
  Default as MonitorConfigDefault,
  layer as monitorConfigLayer,
  makeEventMonitor,
  MonitorConfig,
  monitorConfig,
} from "./config.js";

// Inspection / introspection
export type {
  EventHandledEvent,
  EventSentEvent,
  InspectionEvent,
  TransitionEvent,
} from "./inspection.js";
export {
  attachInspector,
  collectingInspector,
  consoleInspector,
  inspect,
  Inspector as InspectorService,
  makeInspector,
} from "./inspection.js";
export type { Inspector } from "./inspection.js";

// Errors
export {
  AssertionError,
  EmptyStateStackError,
  InvalidMachineInfoError,
  KindMismatchError,
  ShapeMismatchError,
} from "./errors.js";

// Testing utilities
export { assertOrder, recordNotifications } from "./testing.js";
export type { NotificationRecorder } from "./testing.js";
