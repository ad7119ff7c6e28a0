/**
 * Live instances pair a static descriptor with runtime data.
 *
 * Generated code supplies one concrete shape per declared state and per event
 * signature; observers only rely on the capability interfaces below.
 *
 * @module
 */
import { Option } from "effect";

import type { Environment, Value } from "./environment.js";
import { EMPTY } from "./environment.js";
import { ShapeMismatchError } from "./errors.js";
import type { MethodInfo, StateInfo, TransitionInfo, TransitionKind } from "./info.js";

// ============================================================================
// Capabilities
// ============================================================================

/**
 * A state entered or pushed at runtime, with its bound construction arguments and
 * variables. The same instance may be held by the current-state slot, the state stack
 * and an in-flight transition notification at once.
 */
export interface StateInstance {
  readonly info: StateInfo;
  readonly arguments: () => Environment;
  readonly variables: () => Environment;
}

/**
 * One dispatch of an event or action.
 */
export interface MethodInstance {
  readonly info: MethodInfo;
  readonly arguments: () => Environment;
  /** Populated once handling completes; none for void methods */
  readonly returnValue: () => Option.Option<Value>;
}

/**
 * The method instance the runtime creates for each dispatch.
 * Handlers store the result with {@link MethodCall.setReturnValue}; observers only read.
 */
export class MethodCall implements MethodInstance {
  private result: Option.Option<Value> = Option.none();

  constructor(
    readonly info: MethodInfo,
    private readonly args: Environment = EMPTY,
  ) {}

  arguments(): Environment {
    return this.args;
  }

  returnValue(): Option.Option<Value> {
    return this.result;
  }

  setReturnValue(value: Value): void {
    this.result = Option.some(value);
  }
}

// ============================================================================
// Transitions
// ============================================================================

/**
 * One completed transition or change-state.
 *
 * `exitArguments` / `enterArguments` are the environments passed to the exit and
 * enter sub-events; both are empty for change-states.
 */
export class TransitionInstance<S extends StateInstance = StateInstance> {
  constructor(
    readonly info: TransitionInfo,
    readonly oldState: S,
    readonly newState: S,
    readonly exitArguments: Environment = EMPTY,
    readonly enterArguments: Environment = EMPTY,
  ) {}

  static transition<S extends StateInstance>(
    info: TransitionInfo,
    oldState: S,
    newState: S,
    exitArguments: Environment = EMPTY,
    enterArguments: Environment = EMPTY,
  ): TransitionInstance<S> {
    return new TransitionInstance(info, oldState, newState, exitArguments, enterArguments);
  }

  static changeState<S extends StateInstance>(
    info: TransitionInfo,
    oldState: S,
    newState: S,
  ): TransitionInstance<S> {
    return new TransitionInstance(info, oldState, newState);
  }

  get kind(): TransitionKind {
    return this.info.kind;
  }

  get id(): number {
    return this.info.id;
  }

  /** `Old->New` for transitions, `Old->>New` for change-states */
  toString(): string {
    const arrow = this.info.kind === "Transition" ? "->" : "->>";
    return `${this.oldState.info.name}${arrow}${this.newState.info.name}`;
  }
}

// ============================================================================
// Shape coercion
// ============================================================================

type Named = { readonly info: { readonly name: string } };

/**
 * Narrow a live instance to a concrete generated shape.
 * Throws {@link ShapeMismatchError}: a wrong shape here is a defect, not a runtime condition.
 */
export const downcast = <B extends Named, A extends B>(
  instance: B,
  guard: (instance: B) => instance is A,
  expected: string,
): A => {
  if (guard(instance)) return instance;
  throw new ShapeMismatchError({ expected, actual: instance.info.name });
};

/**
 * {@link downcast} by class.
 */
export const downcastTo = <B extends Named, A extends B>(
  instance: B,
  shape: abstract new (...args: never[]) => A,
): A => {
  if (instance instanceof shape) return instance;
  throw new ShapeMismatchError({ expected: shape.name, actual: instance.info.name });
};
