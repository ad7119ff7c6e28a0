/**
 * Static descriptors of a machine's shape.
 *
 * One {@link MachineInfo} exists per generated machine type. It is built once, from the
 * table the compiler emits, and shared by every instance of that machine. Nothing in
 * here changes after {@link defineMachine} returns.
 *
 * @example
 * ```ts
 * import { defineMachine } from "hsm-runtime"
 *
 * const info = defineMachine({
 *   name: "Toggle",
 *   states: [
 *     { name: "Off", handlers: ["flip"] },
 *     { name: "On", handlers: ["flip"] },
 *   ],
 *   events: [{ name: "flip" }],
 *   interface: ["flip"],
 *   transitions: [
 *     { id: 0, kind: "Transition", event: "flip", source: "Off", target: "On" },
 *     { id: 1, kind: "ChangeState", event: "flip", source: "On", target: "Off" },
 *   ],
 * })
 * ```
 *
 * @module
 */
import { Data, Option } from "effect";

import { InvalidMachineInfoError } from "./errors.js";

// ============================================================================
// Descriptors
// ============================================================================

/** A named parameter or variable; `type` is the DSL type name, when declared */
export interface ParameterInfo {
  readonly name: string;
  readonly type?: string;
}

/** An event or action */
export interface MethodInfo {
  readonly name: string;
  readonly parameters: ReadonlyArray<ParameterInfo>;
  readonly returnType?: string;
}

export interface StateInfo {
  readonly name: string;
  readonly parent: Option.Option<StateInfo>;
  /** Construction parameters */
  readonly parameters: ReadonlyArray<ParameterInfo>;
  readonly variables: ReadonlyArray<ParameterInfo>;
  /** Events this state handles itself */
  readonly handlers: ReadonlyArray<MethodInfo>;
  /** The machine declaring this state, resolved once the whole table exists */
  readonly machine: MachineInfo;
}

/**
 * `Transition` runs exit/enter logic, `ChangeState` bypasses it.
 */
export type TransitionKind = "Transition" | "ChangeState";

/**
 * Where a transition leads. `StackPop` targets are only known at dispatch time, from
 * the top of the state stack.
 */
export type TransitionTarget = Data.TaggedEnum<{
  State: { readonly state: StateInfo };
  StackPop: {};
}>;

export const TransitionTarget = Data.taggedEnum<TransitionTarget>();

export interface TransitionInfo {
  /** Assigned at generation time; stable across runs, not necessarily contiguous */
  readonly id: number;
  readonly kind: TransitionKind;
  readonly event: MethodInfo;
  readonly label: string;
  readonly source: StateInfo;
  readonly target: TransitionTarget;
}

export interface MachineInfo {
  readonly name: string;
  /** Domain variables */
  readonly variables: ReadonlyArray<ParameterInfo>;
  /** Declaration order; the first one is the initial state */
  readonly states: ReadonlyArray<StateInfo>;
  readonly interface: ReadonlyArray<MethodInfo>;
  readonly actions: ReadonlyArray<MethodInfo>;
  /** Every event, including the enter/exit sub-events of each state */
  readonly events: ReadonlyArray<MethodInfo>;
  readonly transitions: ReadonlyArray<TransitionInfo>;
  readonly initialState: StateInfo;
  readonly getState: (name: string) => Option.Option<StateInfo>;
  readonly getEvent: (name: string) => Option.Option<MethodInfo>;
  readonly getAction: (name: string) => Option.Option<MethodInfo>;
  readonly getTransition: (id: number) => Option.Option<TransitionInfo>;
}

// ============================================================================
// Helpers
// ============================================================================

/** Name of the enter sub-event of a state */
export const enterEventName = (state: string): string => `${state}:>`;

/** Name of the exit sub-event of a state */
export const exitEventName = (state: string): string => `${state}:<`;

export const isStackPop = (transition: TransitionInfo): boolean =>
  transition.target._tag === "StackPop";

/** Static target state, or none for stack pops */
export const targetState = (transition: TransitionInfo): Option.Option<StateInfo> =>
  TransitionTarget.$match(transition.target, {
    State: ({ state }) => Option.some(state),
    StackPop: () => Option.none(),
  });

/** True if `ancestor` is a strict ancestor of `state` in the hierarchy */
export const isAncestor = (ancestor: StateInfo, state: StateInfo): boolean => {
  let current = state.parent;
  while (Option.isSome(current)) {
    if (current.value === ancestor) return true;
    current = current.value.parent;
  }
  return false;
};

/**
 * First state, walking from `state` up through its ancestors, that handles `event`.
 */
export const findHandler = (state: StateInfo, event: string): Option.Option<StateInfo> => {
  let current: Option.Option<StateInfo> = Option.some(state);
  while (Option.isSome(current)) {
    if (current.value.handlers.some((h) => h.name === event)) return current;
    current = current.value.parent;
  }
  return Option.none();
};

// ============================================================================
// Definition
// ============================================================================

export interface MethodSpec {
  readonly name: string;
  readonly parameters?: ReadonlyArray<ParameterInfo>;
  readonly returnType?: string;
}

export interface StateSpec {
  readonly name: string;
  readonly parent?: string;
  readonly parameters?: ReadonlyArray<ParameterInfo>;
  readonly variables?: ReadonlyArray<ParameterInfo>;
  /** Names of handled events */
  readonly handlers?: ReadonlyArray<string>;
}

/** A state name, or a stack pop */
export type TargetSpec = string | { readonly stackPop: true };

export interface TransitionSpec {
  readonly id: number;
  readonly kind: TransitionKind;
  readonly event: string;
  readonly label?: string;
  readonly source: string;
  readonly target: TargetSpec;
}

/** The static table emitted for one machine type */
export interface MachineSpec {
  readonly name: string;
  readonly variables?: ReadonlyArray<ParameterInfo>;
  readonly states: ReadonlyArray<StateSpec>;
  /** Enter/exit sub-events may be omitted; they are added without parameters */
  readonly events: ReadonlyArray<MethodSpec>;
  readonly actions?: ReadonlyArray<MethodSpec>;
  /** Names of events exposed on the machine's public interface */
  readonly interface?: ReadonlyArray<string>;
  readonly transitions?: ReadonlyArray<TransitionSpec>;
}

const freezeAll = <A>(items: ReadonlyArray<A>): ReadonlyArray<A> => Object.freeze([...items]);

const toMethodInfo = (spec: MethodSpec): MethodInfo =>
  Object.freeze({
    name: spec.name,
    parameters: freezeAll(spec.parameters ?? []),
    ...(spec.returnType === undefined ? {} : { returnType: spec.returnType }),
  });

const indexByName = <A extends { readonly name: string }>(
  items: ReadonlyArray<A>,
  what: string,
  fail: (reason: string) => InvalidMachineInfoError,
): Map<string, A> => {
  const index = new Map<string, A>();
  for (const item of items) {
    if (index.has(item.name)) throw fail(`duplicate ${what} "${item.name}"`);
    index.set(item.name, item);
  }
  return index;
};

/**
 * Build the {@link MachineInfo} for a machine type.
 *
 * States and the machine refer to each other, so the table is built in passes:
 * methods, then states, then parent links and transitions, and finally the machine.
 * A state's `machine` back-link reads a cell that is filled in the last pass.
 *
 * Throws {@link InvalidMachineInfoError} when a name does not resolve.
 */
export const defineMachine = (spec: MachineSpec): MachineInfo => {
  const fail = (reason: string) => new InvalidMachineInfoError({ machine: spec.name, reason });

  if (spec.states.length === 0) throw fail("no states declared");

  // Pass 1: methods
  const events = spec.events.map(toMethodInfo);
  const declared = new Set(events.map((e) => e.name));
  for (const state of spec.states) {
    for (const name of [enterEventName(state.name), exitEventName(state.name)]) {
      if (!declared.has(name)) {
        declared.add(name);
        events.push(toMethodInfo({ name }));
      }
    }
  }
  const actions = (spec.actions ?? []).map(toMethodInfo);
  const eventIndex = indexByName(events, "event", fail);
  const actionIndex = indexByName(actions, "action", fail);

  const resolveEvent = (name: string, where: string): MethodInfo => {
    const event = eventIndex.get(name);
    if (event === undefined) throw fail(`unknown event "${name}" in ${where}`);
    return event;
  };

  // Pass 2: states, with parent and machine links left unresolved
  let machineCell: MachineInfo | undefined;
  const parentCell = new Map<string, Option.Option<StateInfo>>();

  const states: ReadonlyArray<StateInfo> = spec.states.map((s) => {
    const handlers = freezeAll((s.handlers ?? []).map((h) => resolveEvent(h, `state ${s.name}`)));
    return Object.freeze({
      name: s.name,
      parameters: freezeAll(s.parameters ?? []),
      variables: freezeAll(s.variables ?? []),
      handlers,
      get parent(): Option.Option<StateInfo> {
        return parentCell.get(s.name) ?? Option.none();
      },
      get machine(): MachineInfo {
        if (machineCell === undefined) throw fail("machine accessed before definition completed");
        return machineCell;
      },
    });
  });
  const stateIndex = indexByName(states, "state", fail);

  const resolveState = (name: string, where: string): StateInfo => {
    const state = stateIndex.get(name);
    if (state === undefined) throw fail(`unknown state "${name}" in ${where}`);
    return state;
  };

  // Pass 3: parents, then transitions
  for (const s of spec.states) {
    if (s.parent !== undefined) {
      parentCell.set(s.name, Option.some(resolveState(s.parent, `parent of ${s.name}`)));
    }
  }
  for (const state of states) {
    // any chain longer than the state count loops
    let current = state.parent;
    for (let depth = 0; Option.isSome(current); depth++) {
      if (depth >= states.length) throw fail(`parent chain of "${state.name}" has a cycle`);
      current = current.value.parent;
    }
  }

  const transitionIndex = new Map<number, TransitionInfo>();
  const transitions = (spec.transitions ?? []).map((t): TransitionInfo => {
    const where = `transition ${t.id}`;
    if (transitionIndex.has(t.id)) throw fail(`duplicate transition id ${t.id}`);
    const info: TransitionInfo = Object.freeze({
      id: t.id,
      kind: t.kind,
      event: resolveEvent(t.event, where),
      label: t.label ?? "",
      source: resolveState(t.source, where),
      target:
        typeof t.target === "string"
          ? TransitionTarget.State({ state: resolveState(t.target, where) })
          : TransitionTarget.StackPop(),
    });
    transitionIndex.set(t.id, info);
    return info;
  });

  const iface = freezeAll((spec.interface ?? []).map((name) => resolveEvent(name, "interface")));

  // Pass 4: the machine itself
  const machine: MachineInfo = Object.freeze({
    name: spec.name,
    variables: freezeAll(spec.variables ?? []),
    states: freezeAll(states),
    interface: iface,
    actions: freezeAll(actions),
    events: freezeAll(events),
    transitions: freezeAll(transitions),
    initialState: states[0],
    getState: (name: string) => Option.fromNullable(stateIndex.get(name)),
    getEvent: (name: string) => Option.fromNullable(eventIndex.get(name)),
    getAction: (name: string) => Option.fromNullable(actionIndex.get(name)),
    getTransition: (id: number) => Option.fromNullable(transitionIndex.get(id)),
  });
  machineCell = machine;
  return machine;
};
