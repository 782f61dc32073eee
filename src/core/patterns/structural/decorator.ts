/**
 * Decorator: coffee add-ons and text formatting layered at runtime
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

// =============================================================================
// Coffee
// =============================================================================

export interface Coffee {
  getDescription(): string;
  /** Price in cents */
  getCost(): number;
}

export function formatPrice(cents: number): string {
  return `$${(cents / 100).toFixed(2)}`;
}

class BaseCoffee implements Coffee {
  constructor(
    private readonly description: string,
    private readonly cost: number
  ) {}

  getDescription(): string {
    return this.description;
  }

  getCost(): number {
    return this.cost;
  }
}

export const simpleCoffee = (): Coffee => new BaseCoffee("Simple Coffee", 200);
export const espresso = (): Coffee => new BaseCoffee("Espresso", 350);
export const darkRoast = (): Coffee => new BaseCoffee("Dark Roast Coffee", 275);

export abstract class CoffeeDecorator implements Coffee {
  protected abstract readonly addOn: string;
  protected abstract readonly price: number;

  constructor(protected readonly inner: Coffee) {}

  getDescription(): string {
    return `${this.inner.getDescription()}, ${this.addOn}`;
  }

  getCost(): number {
    return this.inner.getCost() + this.price;
  }
}

export class MilkDecorator extends CoffeeDecorator {
  protected readonly addOn = "Milk";
  protected readonly price = 50;
}

export class SugarDecorator extends CoffeeDecorator {
  protected readonly addOn = "Sugar";
  protected readonly price = 25;
}

export class WhippedCreamDecorator extends CoffeeDecorator {
  protected readonly addOn = "Whipped Cream";
  protected readonly price = 75;
}

export class VanillaDecorator extends CoffeeDecorator {
  protected readonly addOn = "Vanilla";
  protected readonly price = 60;
}

export class CaramelDecorator extends CoffeeDecorator {
  protected readonly addOn = "Caramel";
  protected readonly price = 80;
}

// =============================================================================
// Text
// =============================================================================

export interface TextComponent {
  render(): string;
}

export class PlainText implements TextComponent {
  constructor(private readonly text: string) {}

  render(): string {
    return this.text;
  }
}

export class BoldDecorator implements TextComponent {
  constructor(private readonly inner: TextComponent) {}

  render(): string {
    return `**${this.inner.render()}**`;
  }
}

export class ItalicDecorator implements TextComponent {
  constructor(private readonly inner: TextComponent) {}

  render(): string {
    return `*${this.inner.render()}*`;
  }
}

export class UnderlineDecorator implements TextComponent {
  constructor(private readonly inner: TextComponent) {}

  render(): string {
    return `<u>${this.inner.render()}</u>`;
  }
}

export class DecoratorPatternDemo implements PatternDemo {
  readonly name = "Decorator";
  readonly description =
    "Allows behavior to be added to objects dynamically without altering their structure. " +
    "Useful for extending functionality in a flexible and composable way, " +
    "especially when many combinations of features are possible.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("☕ Coffee Shop Decorator Pattern Example");
    this.out.writeLine();

    this.out.writeLine("☕ Basic Coffee Orders:");
    this.order(simpleCoffee());
    this.order(new MilkDecorator(simpleCoffee()));
    this.order(new SugarDecorator(simpleCoffee()));

    this.out.writeLine("🎂 Complex Coffee Orders (Multiple Decorators):");
    this.order(new SugarDecorator(new MilkDecorator(espresso())), "Latte");
    this.order(new WhippedCreamDecorator(new MilkDecorator(espresso())), "Cappuccino");
    this.order(
      new VanillaDecorator(
        new WhippedCreamDecorator(new CaramelDecorator(new SugarDecorator(new MilkDecorator(espresso()))))
      ),
      "Luxury Coffee"
    );

    this.out.writeLine("  🔧 Building custom order step by step:");
    let custom = darkRoast();
    this.out.writeLine(`     1. Base: ${custom.getDescription()} - ${formatPrice(custom.getCost())}`);
    custom = new MilkDecorator(custom);
    this.out.writeLine(`     2. +Milk: ${custom.getDescription()} - ${formatPrice(custom.getCost())}`);
    custom = new CaramelDecorator(custom);
    this.out.writeLine(`     3. +Caramel: ${custom.getDescription()} - ${formatPrice(custom.getCost())}`);
    this.out.writeLine();

    this.out.writeLine("📝 Text Formatting Decorator Example:");
    const texts: TextComponent[] = [
      new PlainText("Hello, World!"),
      new BoldDecorator(new PlainText("Important Message")),
      new UnderlineDecorator(new BoldDecorator(new ItalicDecorator(new PlainText("Fully Formatted Text")))),
    ];
    for (const text of texts) {
      this.out.writeLine(`  📄 ${text.render()}`);
    }
  }

  private order(coffee: Coffee, label = "Order"): void {
    this.out.writeLine(`  🧾 ${label}:`);
    this.out.writeLine(`     📋 ${coffee.getDescription()}`);
    this.out.writeLine(`     💰 Total: ${formatPrice(coffee.getCost())}`);
    this.out.writeLine();
  }
}
