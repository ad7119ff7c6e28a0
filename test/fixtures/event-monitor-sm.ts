/**
 * Machine in the shape the compiler emits, used to exercise notification order.
 *
 * A --transit--> B --transit--> C --transit--> D, where entering B or C sends
 * `transit` again and entering D sends `change`, so one `transit` in A cascades all
 * the way round to A. `change` is a change-state A->>B->>C->>A (D->>A), `reset`
 * change-states back to A, `mult` returns the product of its arguments.
 */
import { Option } from "effect";

import type { EnvironmentType, MethodCall, StateInfo, StateInstance } from "../../src/index.js";
import { defineMachine, EMPTY, Environment, MachineRuntime, Value } from "../../src/index.js";

const HANDLERS = ["mult", "change", "reset", "transit"];

export const EventMonitorSmInfo = defineMachine({
  name: "EventMonitorSm",
  states: [
    { name: "A", handlers: HANDLERS },
    { name: "B", handlers: [...HANDLERS, "B:>"] },
    { name: "C", handlers: [...HANDLERS, "C:>"] },
    { name: "D", handlers: [...HANDLERS, "D:>"] },
  ],
  events: [
    {
      name: "mult",
      parameters: [
        { name: "a", type: "i32" },
        { name: "b", type: "i32" },
      ],
      returnType: "i32",
    },
    { name: "change", returnType: "u32" },
    { name: "reset" },
    { name: "transit", parameters: [{ name: "x", type: "i32" }] },
  ],
  interface: HANDLERS,
  transitions: [
    { id: 0, kind: "Transition", event: "transit", source: "A", target: "B" },
    { id: 1, kind: "ChangeState", event: "change", source: "A", target: "B" },
    { id: 2, kind: "Transition", event: "transit", source: "B", target: "C" },
    { id: 3, kind: "ChangeState", event: "change", source: "B", target: "C" },
    { id: 4, kind: "Transition", event: "transit", source: "C", target: "D" },
    { id: 5, kind: "ChangeState", event: "change", source: "C", target: "A" },
    { id: 6, kind: "Transition", event: "transit", source: "D", target: "A" },
    { id: 7, kind: "ChangeState", event: "change", source: "D", target: "A" },
    { id: 8, kind: "ChangeState", event: "reset", source: "B", target: "A" },
    { id: 9, kind: "ChangeState", event: "reset", source: "C", target: "A" },
    { id: 10, kind: "ChangeState", event: "reset", source: "D", target: "A" },
  ],
});

const stateInfo = (name: string): StateInfo => Option.getOrThrow(EventMonitorSmInfo.getState(name));

export class EventMonitorSmState implements StateInstance {
  constructor(readonly info: StateInfo) {}

  arguments(): EnvironmentType {
    return EMPTY;
  }

  variables(): EnvironmentType {
    return EMPTY;
  }
}

export class EventMonitorSm extends MachineRuntime<EventMonitorSmState> {
  constructor() {
    super(EventMonitorSmInfo, new EventMonitorSmState(stateInfo("A")), {
      eventHistoryCapacity: Option.some(5),
      transitionHistoryCapacity: Option.some(3),
    });
    this.start();
  }

  get state(): string {
    return this.currentState().info.name;
  }

  mult(a: number, b: number): number {
    const call = this.send(
      "mult",
      Environment.fromValues({ a: Value.Integer({ value: a }), b: Value.Integer({ value: b }) }),
    );
    return Environment.asInteger(Option.getOrThrow(call.returnValue()));
  }

  /** Returns the position of the state changed to */
  change(): number {
    const call = this.send("change");
    return Environment.asInteger(Option.getOrThrow(call.returnValue()));
  }

  reset(): void {
    this.send("reset");
  }

  transit(x: number): void {
    this.send("transit", Environment.fromValues({ x: Value.Integer({ value: x }) }));
  }

  protected override handleEvent(event: MethodCall): void {
    const name = event.info.name;
    if (name === "mult") {
      const args = event.arguments();
      const a = Option.getOrThrow(Environment.get(args, "a", "Integer"));
      const b = Option.getOrThrow(Environment.get(args, "b", "Integer"));
      event.setReturnValue(Value.Integer({ value: a * b }));
      return;
    }
    switch (this.state) {
      case "A":
        return this.aHandler(event);
      case "B":
        return this.bHandler(event);
      case "C":
        return this.cHandler(event);
      case "D":
        return this.dHandler(event);
    }
  }

  private aHandler(event: MethodCall): void {
    switch (event.info.name) {
      case "transit":
        return this.go(0, "B");
      case "change":
        return this.changeTo(event, 1, "B");
    }
  }

  private bHandler(event: MethodCall): void {
    switch (event.info.name) {
      case "B:>":
        return this.transit(1);
      case "transit":
        return this.go(2, "C");
      case "change":
        return this.changeTo(event, 3, "C");
      case "reset":
        return this.changeTo(event, 8, "A");
    }
  }

  private cHandler(event: MethodCall): void {
    switch (event.info.name) {
      case "C:>":
        return this.transit(2);
      case "transit":
        return this.go(4, "D");
      case "change":
        return this.changeTo(event, 5, "A");
      case "reset":
        return this.changeTo(event, 9, "A");
    }
  }

  private dHandler(event: MethodCall): void {
    switch (event.info.name) {
      case "D:>":
        this.change();
        return;
      case "transit":
        return this.go(6, "A");
      case "change":
        return this.changeTo(event, 7, "A");
      case "reset":
        return this.changeTo(event, 10, "A");
    }
  }

  private go(id: number, target: string): void {
    this.transition(
      Option.getOrThrow(EventMonitorSmInfo.getTransition(id)),
      new EventMonitorSmState(stateInfo(target)),
    );
  }

  private changeTo(event: MethodCall, id: number, target: string): void {
    this.changeState(
      Option.getOrThrow(EventMonitorSmInfo.getTransition(id)),
      new EventMonitorSmState(stateInfo(target)),
    );
    if (event.info.name === "change") {
      const position = EventMonitorSmInfo.states.findIndex((s) => s.name === target);
      event.setReturnValue(Value.Integer({ value: position }));
    }
  }
}
