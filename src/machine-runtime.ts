/**
 * Base class for generated machines.
 *
 * Generated code extends {@link MachineRuntime}, routes events to state handlers in
 * {@link MachineRuntime.handleEvent}, and changes state only through `transition`,
 * `changeState`, `popState` and `popChangeState`. Those methods drive the
 * {@link EventMonitor} at the points the notification protocol requires.
 *
 * Dispatch is plain synchronous recursion: a handler may send further events or
 * transition again before returning, and the whole cascade completes before the
 * outermost call returns. Depth is bounded only by how far a machine chains
 * transitions; there is no trampoline.
 *
 * @example
 * ```ts
 * class Toggle extends MachineRuntime<OffState | OnState> {
 *   constructor() {
 *     super(ToggleInfo, new OffState())
 *     this.start()
 *   }
 *
 *   flip(): void {
 *     this.send("flip")
 *   }
 *
 *   protected override handleEvent(event: MethodCall): void {
 *     if (event.info.name === "flip" && this.currentState() instanceof OffState) {
 *       this.transition(ToggleInfo.transitions[0], new OnState())
 *     }
 *   }
 * }
 * ```
 *
 * @module
 */
import { Option } from "effect";

import type { Environment } from "./environment.js";
import { EMPTY } from "./environment.js";
import { EmptyStateStackError, InvalidMachineInfoError } from "./errors.js";
import type { EventMonitorOptions } from "./event-monitor.js";
import { EventMonitor } from "./event-monitor.js";
import type { MachineInfo, MethodInfo, TransitionInfo } from "./info.js";
import { enterEventName, exitEventName } from "./info.js";
import type { StateInstance } from "./live.js";
import { MethodCall, TransitionInstance } from "./live.js";
import { StateStack } from "./state-stack.js";

export abstract class MachineRuntime<S extends StateInstance> {
  private current: S;
  private readonly monitor: EventMonitor<S>;
  private readonly stack = new StateStack<S>();

  constructor(
    readonly info: MachineInfo,
    initial: S,
    options: EventMonitorOptions = {},
  ) {
    this.current = initial;
    this.monitor = EventMonitor.make<S>(options);
  }

  // ==========================================================================
  // Public surface
  // ==========================================================================

  currentState(): S {
    return this.current;
  }

  /** Machine-wide variables; machines without domain variables keep the empty default */
  domainVariables(): Environment {
    return EMPTY;
  }

  eventMonitor(): EventMonitor<S> {
    return this.monitor;
  }

  /** Saved states, bottom to top */
  stateStack(): ReadonlyArray<S> {
    return this.stack.entries();
  }

  // ==========================================================================
  // Generated-code contract
  // ==========================================================================

  /** Route an event to the current state's handler. */
  protected abstract handleEvent(event: MethodCall): void;

  /** Called after the state pointer moves during a transition */
  protected transitionHook(_oldState: S, _newState: S): void {}

  /** Called after the state pointer moves during a change-state */
  protected changeStateHook(_oldState: S, _newState: S): void {}

  /** Send the initial state's enter event. */
  protected start(enterArgs: Environment = EMPTY): void {
    this.send(enterEventName(this.current.info.name), enterArgs);
  }

  /**
   * Dispatch an event: sent, handled by the current state, then handled.
   * Returns the call so interface methods can read its return value.
   */
  protected send(event: MethodInfo | string, args: Environment = EMPTY): MethodCall {
    const call = new MethodCall(this.resolveEvent(event), args);
    this.monitor.eventSent(call);
    this.handleEvent(call);
    this.monitor.eventHandled(call);
    return call;
  }

  /**
   * Leave the current state through its exit event, install `next`, report the
   * transition, then enter `next`.
   */
  protected transition(
    info: TransitionInfo,
    next: S,
    exitArgs: Environment = EMPTY,
    enterArgs: Environment = EMPTY,
  ): void {
    this.send(exitEventName(this.current.info.name), exitArgs);
    // read after the exit event: its handler may have moved the machine already
    const old = this.current;
    this.current = next;
    this.transitionHook(old, next);
    this.monitor.transitionOccurred(
      TransitionInstance.transition(info, old, next, exitArgs, enterArgs),
    );
    this.send(enterEventName(next.info.name), enterArgs);
  }

  /** Install `next` without exit or enter events. */
  protected changeState(info: TransitionInfo, next: S): void {
    const old = this.current;
    this.current = next;
    this.changeStateHook(old, next);
    this.monitor.transitionOccurred(TransitionInstance.changeState(info, old, next));
  }

  /** Save the current state instance, bound arguments and variables included. */
  protected pushState(): void {
    this.stack.push(this.current);
  }

  /**
   * Restore the most recently pushed state with a full transition. The restored
   * instance is reused as-is; only its enter event is sent again, with no arguments.
   * Throws {@link EmptyStateStackError} before any notification if nothing was pushed.
   */
  protected popState(info: TransitionInfo, exitArgs: Environment = EMPTY): void {
    this.transition(info, this.popStack(), exitArgs, EMPTY);
  }

  /** Restore the most recently pushed state without exit or enter events. */
  protected popChangeState(info: TransitionInfo): void {
    this.changeState(info, this.popStack());
  }

  private popStack(): S {
    return Option.getOrThrowWith(
      this.stack.pop(),
      () => new EmptyStateStackError({ machine: this.info.name }),
    );
  }

  private resolveEvent(event: MethodInfo | string): MethodInfo {
    if (typeof event !== "string") return event;
    return Option.getOrThrowWith(
      this.info.getEvent(event),
      () => new InvalidMachineInfoError({ machine: this.info.name, reason: `unknown event "${event}"` }),
    );
  }
}
