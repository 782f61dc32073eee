/**
 * Template Method: beverage recipes sharing one preparation skeleton
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

export abstract class Beverage {
  constructor(protected readonly out: DemoOutput) {}

  /** The fixed skeleton; subclasses supply brew() and addCondiments() */
  prepareRecipe(): void {
    this.boilWater();
    this.brew();
    this.pourInCup();
    if (this.wantsCondiments()) {
      this.addCondiments();
    }
  }

  private boilWater(): void {
    this.out.writeLine("💧 Boiling water");
  }

  private pourInCup(): void {
    this.out.writeLine("🥤 Pouring into cup");
  }

  /** Hook: subclasses may opt out of condiments */
  protected wantsCondiments(): boolean {
    return true;
  }

  protected abstract brew(): void;
  protected abstract addCondiments(): void;
}

export class Tea extends Beverage {
  protected brew(): void {
    this.out.writeLine("🍵 Steeping the tea");
  }

  protected addCondiments(): void {
    this.out.writeLine("🍋 Adding lemon");
  }
}

export class CoffeeBeverage extends Beverage {
  protected brew(): void {
    this.out.writeLine("☕ Dripping coffee through filter");
  }

  protected addCondiments(): void {
    this.out.writeLine("🥛 Adding sugar and milk");
  }
}

export class BlackCoffee extends CoffeeBeverage {
  protected wantsCondiments(): boolean {
    return false;
  }
}

export class TemplateMethodPatternDemo implements PatternDemo {
  readonly name = "Template Method";
  readonly description = "Defines the skeleton of an algorithm, letting subclasses override specific steps.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("☕ Beverage Template Method Example");
    const recipes: Array<[string, Beverage]> = [
      ["🍵 Making tea:", new Tea(this.out)],
      ["☕ Making coffee:", new CoffeeBeverage(this.out)],
      ["⚫ Making black coffee (hook skips condiments):", new BlackCoffee(this.out)],
    ];

    recipes.forEach(([title, beverage], index) => {
      if (index > 0) this.out.writeLine();
      this.out.writeLine(title);
      beverage.prepareRecipe();
    });
  }
}
