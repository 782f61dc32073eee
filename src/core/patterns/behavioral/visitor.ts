/**
 * Visitor: area and perimeter computed outside the shape classes
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

export interface ShapeVisitor<R> {
  visitCircle(circle: Circle): R;
  visitRectangle(rectangle: Rectangle): R;
  visitRightTriangle(triangle: RightTriangle): R;
}

export interface Shape {
  accept<R>(visitor: ShapeVisitor<R>): R;
}

export class Circle implements Shape {
  constructor(readonly radius: number) {}
  accept<R>(visitor: ShapeVisitor<R>): R {
    return visitor.visitCircle(this);
  }
}

export class Rectangle implements Shape {
  constructor(
    readonly width: number,
    readonly height: number
  ) {}
  accept<R>(visitor: ShapeVisitor<R>): R {
    return visitor.visitRectangle(this);
  }
}

export class RightTriangle implements Shape {
  constructor(
    readonly base: number,
    readonly height: number
  ) {}
  accept<R>(visitor: ShapeVisitor<R>): R {
    return visitor.visitRightTriangle(this);
  }
}

export const areaCalculator: ShapeVisitor<number> = {
  visitCircle: (c) => Math.PI * c.radius * c.radius,
  visitRectangle: (r) => r.width * r.height,
  visitRightTriangle: (t) => 0.5 * t.base * t.height,
};

export const perimeterCalculator: ShapeVisitor<number> = {
  visitCircle: (c) => 2 * Math.PI * c.radius,
  visitRectangle: (r) => 2 * (r.width + r.height),
  visitRightTriangle: (t) => t.base + t.height + Math.hypot(t.base, t.height),
};

export const shapeLabel: ShapeVisitor<string> = {
  visitCircle: () => "🔵 Circle",
  visitRectangle: () => "⬜ Rectangle",
  visitRightTriangle: () => "🔺 Triangle",
};

export class VisitorPatternDemo implements PatternDemo {
  readonly name = "Visitor";
  readonly description = "Defines operations to be performed on elements without changing their classes.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("🎯 Shape Visitor Example");
    const shapes: Shape[] = [new Circle(5), new Rectangle(4, 6), new RightTriangle(3, 4)];

    this.out.writeLine("📐 Calculating areas:");
    for (const shape of shapes) {
      this.out.writeLine(`${shape.accept(shapeLabel)} area: ${shape.accept(areaCalculator).toFixed(2)}`);
    }

    this.out.writeLine();
    this.out.writeLine("📏 Calculating perimeters:");
    for (const shape of shapes) {
      this.out.writeLine(`${shape.accept(shapeLabel)} perimeter: ${shape.accept(perimeterCalculator).toFixed(2)}`);
    }
  }
}
