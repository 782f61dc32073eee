/**
 * Proxy: images loaded from disk only when first displayed
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

export interface Image {
  display(): void;
}

export class RealImage implements Image {
  constructor(
    private readonly filename: string,
    private readonly out: DemoOutput
  ) {
    this.out.writeLine(`💾 Loading ${filename} from disk...`);
  }

  display(): void {
    this.out.writeLine(`🖼️ Displaying ${this.filename}`);
  }
}

export class ImageProxy implements Image {
  private realImage: RealImage | null = null;

  constructor(
    private readonly filename: string,
    private readonly out: DemoOutput
  ) {}

  get loaded(): boolean {
    return this.realImage !== null;
  }

  display(): void {
    this.realImage ??= new RealImage(this.filename, this.out);
    this.realImage.display();
  }
}

export class ProxyPatternDemo implements PatternDemo {
  readonly name = "Proxy";
  readonly description = "Provides a placeholder or surrogate to control access to another object.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("🖼️ Image Proxy Example");
    const images = ["photo1.jpg", "photo2.jpg", "photo3.jpg"].map(
      (file) => new ImageProxy(file, this.out)
    );
    this.out.writeLine("📋 Images created (not loaded yet)");

    const [first, second] = images;
    if (!first || !second) return;

    this.out.writeLine();
    this.out.writeLine("🎨 Displaying first image:");
    first.display();
    this.out.writeLine();
    this.out.writeLine("🎨 Displaying first image again (cached):");
    first.display();
    this.out.writeLine();
    this.out.writeLine("🎨 Displaying second image:");
    second.display();
    this.out.writeLine();
    this.out.writeLine(`📦 Loaded: ${images.filter((image) => image.loaded).length} of ${images.length}`);
  }
}
