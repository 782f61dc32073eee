/**
 * Command: smart home actions as objects, with macros and undo
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

// =============================================================================
// Receivers
// =============================================================================

export class SmartLight {
  brightness = 0;

  constructor(
    readonly room: string,
    private readonly out: DemoOutput
  ) {}

  setBrightness(level: number): void {
    this.brightness = level;
    this.out.writeLine(
      level > 0 ? `  💡 ${this.room} light ON at ${level}%` : `  💡 ${this.room} light OFF`
    );
  }
}

export class SmartThermostat {
  temperature = 70;

  constructor(private readonly out: DemoOutput) {}

  setTemperature(degrees: number): void {
    this.temperature = degrees;
    this.out.writeLine(`  🌡️ Thermostat set to ${degrees}°F`);
  }
}

// =============================================================================
// Commands
// =============================================================================

export interface Command {
  readonly label: string;
  execute(): void;
  undo(): void;
}

export class SetBrightnessCommand implements Command {
  private previous = 0;

  constructor(
    private readonly light: SmartLight,
    private readonly level: number
  ) {}

  get label(): string {
    return this.level > 0 ? `Light on (${this.level}%)` : "Light off";
  }

  execute(): void {
    this.previous = this.light.brightness;
    this.light.setBrightness(this.level);
  }

  undo(): void {
    this.light.setBrightness(this.previous);
  }
}

export class SetTemperatureCommand implements Command {
  private previous = 0;

  constructor(
    private readonly thermostat: SmartThermostat,
    private readonly degrees: number
  ) {}

  get label(): string {
    return `Temperature ${this.degrees}°F`;
  }

  execute(): void {
    this.previous = this.thermostat.temperature;
    this.thermostat.setTemperature(this.degrees);
  }

  undo(): void {
    this.thermostat.setTemperature(this.previous);
  }
}

/** Runs its commands in order; undoes them in reverse */
export class MacroCommand implements Command {
  constructor(
    readonly label: string,
    private readonly commands: readonly Command[]
  ) {}

  execute(): void {
    for (const command of this.commands) command.execute();
  }

  undo(): void {
    for (const command of [...this.commands].reverse()) command.undo();
  }
}

// =============================================================================
// Invoker
// =============================================================================

export class SmartHomeRemote {
  private readonly history: Command[] = [];

  run(command: Command): void {
    command.execute();
    this.history.push(command);
  }

  /** Returns false when there is nothing left to undo */
  undoLast(): boolean {
    const command = this.history.pop();
    if (!command) return false;
    command.undo();
    return true;
  }

  get historySize(): number {
    return this.history.length;
  }
}

// =============================================================================
// Scheduler
// =============================================================================

interface ScheduledCommand {
  command: Command;
  /** Minutes after midnight */
  at: number;
  description: string;
}

export function formatClock(minutes: number): string {
  const hours = Math.floor(minutes / 60) % 24;
  return `${String(hours).padStart(2, "0")}:${String(minutes % 60).padStart(2, "0")}`;
}

/**
 * Queues commands against a simulated clock and runs the ones that are due
 */
export class CommandScheduler {
  private queue: ScheduledCommand[] = [];

  constructor(private readonly out: DemoOutput) {}

  schedule(command: Command, at: number, description = command.label): void {
    this.queue.push({ command, at, description });
    this.out.writeLine(`    📅 Scheduled: ${command.label} at ${formatClock(at)}`);
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Execute every command due at or before `now`, earliest first
   *
   * @returns how many commands ran
   */
  runDue(now: number): number {
    const due = this.queue.filter((entry) => entry.at <= now).sort((a, b) => a.at - b.at);
    if (due.length === 0) {
      this.out.writeLine("    ℹ️ No commands ready for execution");
      return 0;
    }

    this.queue = this.queue.filter((entry) => entry.at > now);
    for (const entry of due) {
      this.out.writeLine(`    ⏰ Executing scheduled: ${entry.description}`);
      entry.command.execute();
    }
    return due.length;
  }
}

export class CommandPatternDemo implements PatternDemo {
  readonly name = "Command";
  readonly description =
    "Encapsulates a request as an object, allowing you to parameterize clients with different requests, " +
    "queue or log requests, and support undo operations.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("🏠 Smart Home Automation Command Example");
    this.out.writeLine();

    const livingRoom = new SmartLight("Living Room", this.out);
    const kitchen = new SmartLight("Kitchen", this.out);
    const thermostat = new SmartThermostat(this.out);
    const remote = new SmartHomeRemote();

    this.out.writeLine("💡 Basic Device Commands:");
    remote.run(new SetBrightnessCommand(livingRoom, 100));
    remote.run(new SetTemperatureCommand(thermostat, 72));
    this.out.writeLine();

    const movieNight = new MacroCommand("Movie Night", [
      new SetBrightnessCommand(livingRoom, 0),
      new SetBrightnessCommand(kitchen, 20),
      new SetTemperatureCommand(thermostat, 68),
    ]);
    this.out.writeLine(`🎭 Executing '${movieNight.label}' macro...`);
    remote.run(movieNight);
    this.out.writeLine();

    this.out.writeLine("↩️ Undo Functionality:");
    while (remote.undoLast()) {
      this.out.writeLine(`  ↩️ Undone (${remote.historySize} left in history)`);
    }
    this.out.writeLine("  ❌ Nothing left to undo");
    this.out.writeLine();

    this.out.writeLine("⏰ Scheduled Command Queue:");
    const scheduler = new CommandScheduler(this.out);
    const morning = 7 * 60;
    scheduler.schedule(new SetBrightnessCommand(livingRoom, 80), morning, "Morning lights");
    scheduler.schedule(new SetBrightnessCommand(kitchen, 100), morning + 10, "Kitchen lights");
    scheduler.schedule(new SetTemperatureCommand(thermostat, 68), morning + 5, "Lower temperature");

    this.out.writeLine(`  🕖 ${formatClock(morning + 5)}:`);
    scheduler.runDue(morning + 5);
    this.out.writeLine(`  🕖 ${formatClock(morning + 30)}:`);
    scheduler.runDue(morning + 30);
    this.out.writeLine(`  🕗 ${formatClock(morning + 60)}:`);
    scheduler.runDue(morning + 60);
  }
}
