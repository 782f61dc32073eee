/**
 * Bridge: remote controls decoupled from the devices they drive
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

export interface Device {
  isEnabled(): boolean;
  enable(): void;
  disable(): void;
  getVolume(): number;
  setVolume(volume: number): void;
}

abstract class OutputDevice implements Device {
  private enabled = false;

  protected constructor(
    private readonly label: string,
    private volume: number,
    private readonly out: DemoOutput
  ) {}

  isEnabled(): boolean {
    return this.enabled;
  }

  enable(): void {
    this.enabled = true;
    this.out.writeLine(`${this.label} is ON`);
  }

  disable(): void {
    this.enabled = false;
    this.out.writeLine(`${this.label} is OFF`);
  }

  getVolume(): number {
    return this.volume;
  }

  setVolume(volume: number): void {
    this.volume = Math.max(0, Math.min(100, volume));
    this.out.writeLine(`${this.label} volume: ${this.volume}`);
  }
}

export class Tv extends OutputDevice {
  constructor(out: DemoOutput) {
    super("📺 TV", 50, out);
  }
}

export class Radio extends OutputDevice {
  constructor(out: DemoOutput) {
    super("📻 Radio", 30, out);
  }
}

export class BasicRemote {
  constructor(protected readonly device: Device) {}

  power(): void {
    if (this.device.isEnabled()) {
      this.device.disable();
    } else {
      this.device.enable();
    }
  }

  volumeUp(): void {
    this.device.setVolume(this.device.getVolume() + 10);
  }

  volumeDown(): void {
    this.device.setVolume(this.device.getVolume() - 10);
  }
}

export class AdvancedRemote extends BasicRemote {
  mute(): void {
    this.device.setVolume(0);
  }
}

export class BridgePatternDemo implements PatternDemo {
  readonly name = "Bridge";
  readonly description = "Separates abstraction from implementation so both can vary independently.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("🌉 Remote Control Bridge Example");

    const basicRemote = new BasicRemote(new Tv(this.out));
    basicRemote.power();
    basicRemote.volumeUp();

    const advancedRemote = new AdvancedRemote(new Radio(this.out));
    advancedRemote.power();
    advancedRemote.mute();
  }
}
