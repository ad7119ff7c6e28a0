/**
 * Five states S0..S4. `transit` moves to the next state with a transition, `change`
 * with a change-state. Entering S2 transitions straight on to S3; entering S4
 * change-states back to S0. Enter/exit events and both hooks are logged.
 */
import { Option } from "effect";

import type { EnvironmentType, MethodCall, StateInfo, StateInstance } from "../../src/index.js";
import { defineMachine, EMPTY, MachineRuntime } from "../../src/index.js";

const ALL = ["transit", "change"];

export const TransitionSmInfo = defineMachine({
  name: "TransitionSm",
  states: [
    { name: "S0", handlers: ALL },
    { name: "S1", handlers: ALL },
    { name: "S2", handlers: [...ALL, "S2:>"] },
    { name: "S3", handlers: ALL },
    { name: "S4", handlers: ["S4:>"] },
  ],
  events: [{ name: "transit" }, { name: "change" }],
  interface: ALL,
  transitions: [
    { id: 0, kind: "Transition", event: "transit", source: "S0", target: "S1" },
    { id: 1, kind: "ChangeState", event: "change", source: "S0", target: "S1" },
    { id: 2, kind: "Transition", event: "transit", source: "S1", target: "S2" },
    { id: 3, kind: "ChangeState", event: "change", source: "S1", target: "S2" },
    { id: 4, kind: "Transition", event: "S2:>", source: "S2", target: "S3", label: "onward" },
    { id: 5, kind: "Transition", event: "transit", source: "S2", target: "S3" },
    { id: 6, kind: "ChangeState", event: "change", source: "S2", target: "S3" },
    { id: 7, kind: "Transition", event: "transit", source: "S3", target: "S4" },
    { id: 8, kind: "ChangeState", event: "change", source: "S3", target: "S4" },
    { id: 9, kind: "ChangeState", event: "S4:>", source: "S4", target: "S0" },
  ],
});

export class TransitionSmState implements StateInstance {
  constructor(readonly info: StateInfo) {}

  arguments(): EnvironmentType {
    return EMPTY;
  }

  variables(): EnvironmentType {
    return EMPTY;
  }
}

const make = (name: string): TransitionSmState =>
  new TransitionSmState(Option.getOrThrow(TransitionSmInfo.getState(name)));

export class TransitionSm extends MachineRuntime<TransitionSmState> {
  readonly enters: string[] = [];
  readonly exits: string[] = [];
  readonly hooks: string[] = [];

  constructor() {
    super(TransitionSmInfo, make("S0"));
    this.start();
  }

  get state(): string {
    return this.currentState().info.name;
  }

  transit(): void {
    this.send("transit");
  }

  change(): void {
    this.send("change");
  }

  clearAll(): void {
    this.enters.length = 0;
    this.exits.length = 0;
    this.hooks.length = 0;
  }

  protected override transitionHook(oldState: TransitionSmState, newState: TransitionSmState): void {
    this.hooks.push(`${oldState.info.name}->${newState.info.name}`);
  }

  protected override changeStateHook(
    oldState: TransitionSmState,
    newState: TransitionSmState,
  ): void {
    this.hooks.push(`${oldState.info.name}->>${newState.info.name}`);
  }

  protected override handleEvent(event: MethodCall): void {
    const state = this.state;
    const name = event.info.name;
    if (name === `${state}:>`) this.enters.push(state);
    if (name === `${state}:<`) this.exits.push(state);

    const fired = TransitionSmInfo.transitions.find(
      (t) => t.source.name === state && t.event.name === name,
    );
    if (fired === undefined || fired.target._tag !== "State") return;

    const next = make(fired.target.state.name);
    if (fired.kind === "Transition") {
      this.transition(fired, next);
    } else {
      this.changeState(fired, next);
    }
  }
}
