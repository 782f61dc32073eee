/**
 * State: a traffic light whose behaviour is its current state object
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

export interface TrafficLightState {
  readonly color: "red" | "green" | "yellow";
  /** Announces the state and returns the state that follows it */
  handle(light: TrafficLight): string;
}

export const RED: TrafficLightState = {
  color: "red",
  handle(light) {
    light.setState(GREEN);
    return "🔴 RED - Stop! Changing to Green...";
  },
};

export const GREEN: TrafficLightState = {
  color: "green",
  handle(light) {
    light.setState(YELLOW);
    return "🟢 GREEN - Go! Changing to Yellow...";
  },
};

export const YELLOW: TrafficLightState = {
  color: "yellow",
  handle(light) {
    light.setState(RED);
    return "🟡 YELLOW - Caution! Changing to Red...";
  },
};

export class TrafficLight {
  private state: TrafficLightState = RED;

  constructor(out?: DemoOutput) {
    out?.writeLine("🚦 Traffic light initialized");
  }

  get color(): TrafficLightState["color"] {
    return this.state.color;
  }

  setState(state: TrafficLightState): void {
    this.state = state;
  }

  request(): string {
    return this.state.handle(this);
  }
}

export class StatePatternDemo implements PatternDemo {
  readonly name = "State";
  readonly description = "Allows an object to alter its behavior when its internal state changes.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("🚦 Traffic Light State Example");
    const light = new TrafficLight(this.out);
    for (let i = 0; i < 6; i++) {
      this.out.writeLine(light.request());
    }
  }
}
