/**
 * Facade: one call to run a whole home theater
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

export class Amplifier {
  constructor(private readonly out: DemoOutput) {}
  on(): void { this.out.writeLine("🔊 Amplifier on"); }
  off(): void { this.out.writeLine("🔊 Amplifier off"); }
  setVolume(level: number): void { this.out.writeLine(`🔊 Setting volume to ${level}`); }
}

export class DvdPlayer {
  constructor(private readonly out: DemoOutput) {}
  on(): void { this.out.writeLine("💿 DVD Player on"); }
  off(): void { this.out.writeLine("💿 DVD Player off"); }
  play(movie: string): void { this.out.writeLine(`💿 Playing '${movie}'`); }
  stop(): void { this.out.writeLine("💿 Stopped"); }
}

export class Projector {
  constructor(private readonly out: DemoOutput) {}
  on(): void { this.out.writeLine("📽️ Projector on"); }
  off(): void { this.out.writeLine("📽️ Projector off"); }
  setInput(_source: DvdPlayer): void { this.out.writeLine("📽️ Setting DVD input"); }
}

export class Lights {
  constructor(private readonly out: DemoOutput) {}
  on(): void { this.out.writeLine("💡 Lights on"); }
  dim(level: number): void { this.out.writeLine(`💡 Dimming to ${level}%`); }
}

export class Screen {
  constructor(private readonly out: DemoOutput) {}
  up(): void { this.out.writeLine("🎥 Screen going up"); }
  down(): void { this.out.writeLine("🎥 Screen going down"); }
}

export class HomeTheaterFacade {
  private readonly amp: Amplifier;
  private readonly dvd: DvdPlayer;
  private readonly projector: Projector;
  private readonly lights: Lights;
  private readonly screen: Screen;

  constructor(private readonly out: DemoOutput) {
    this.amp = new Amplifier(out);
    this.dvd = new DvdPlayer(out);
    this.projector = new Projector(out);
    this.lights = new Lights(out);
    this.screen = new Screen(out);
  }

  watchMovie(movie: string): void {
    this.out.writeLine("🎬 Get ready to watch a movie...");
    this.lights.dim(10);
    this.screen.down();
    this.projector.on();
    this.projector.setInput(this.dvd);
    this.amp.on();
    this.amp.setVolume(5);
    this.dvd.on();
    this.dvd.play(movie);
  }

  endMovie(): void {
    this.out.writeLine("🎬 Shutting movie theater down...");
    this.dvd.stop();
    this.dvd.off();
    this.amp.off();
    this.projector.off();
    this.screen.up();
    this.lights.on();
  }
}

export class FacadePatternDemo implements PatternDemo {
  readonly name = "Facade";
  readonly description = "Provides a simplified interface to a complex subsystem.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("🎬 Home Theater Facade Example");
    const theater = new HomeTheaterFacade(this.out);
    theater.watchMovie("The Matrix");
    this.out.writeLine();
    theater.endMovie();
  }
}
