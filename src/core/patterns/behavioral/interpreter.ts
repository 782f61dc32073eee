/**
 * Interpreter: a tiny arithmetic language evaluated against variables
 *
 * Grammar:
 *   expression := term (("+" | "-") term)*
 *   term       := factor (("*" | "/") factor)*
 *   factor     := number | identifier | "(" expression ")" | "-" factor
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

export type Context = ReadonlyMap<string, number>;

export interface Expression {
  interpret(context: Context): number;
  toString(): string;
}

export class NumberLiteral implements Expression {
  constructor(private readonly value: number) {}
  interpret(): number {
    return this.value;
  }
  toString(): string {
    return String(this.value);
  }
}

export class Variable implements Expression {
  constructor(private readonly name: string) {}
  interpret(context: Context): number {
    const value = context.get(this.name);
    if (value === undefined) {
      throw new Error(`Undefined variable: ${this.name}`);
    }
    return value;
  }
  toString(): string {
    return this.name;
  }
}

export class Negate implements Expression {
  constructor(private readonly operand: Expression) {}
  interpret(context: Context): number {
    return -this.operand.interpret(context);
  }
  toString(): string {
    return `(-${this.operand.toString()})`;
  }
}

export type Operator = "+" | "-" | "*" | "/";

export class BinaryOperation implements Expression {
  constructor(
    private readonly operator: Operator,
    private readonly left: Expression,
    private readonly right: Expression
  ) {}

  interpret(context: Context): number {
    const left = this.left.interpret(context);
    const right = this.right.interpret(context);
    switch (this.operator) {
      case "+":
        return left + right;
      case "-":
        return left - right;
      case "*":
        return left * right;
      case "/":
        if (right === 0) throw new Error("Division by zero");
        return left / right;
    }
  }

  toString(): string {
    return `(${this.left.toString()} ${this.operator} ${this.right.toString()})`;
  }
}

// =============================================================================
// Parser
// =============================================================================

const TOKEN = /\s*(\d+(?:\.\d+)?|[A-Za-z_]\w*|[-+*/()])/y;

export function tokenize(source: string): string[] {
  const tokens: string[] = [];
  TOKEN.lastIndex = 0;
  while (TOKEN.lastIndex < source.length) {
    if (source.slice(TOKEN.lastIndex).trim() === "") break;
    const start = TOKEN.lastIndex;
    const match = TOKEN.exec(source);
    if (!match?.[1]) {
      throw new Error(`Unexpected character at position ${start}: '${source.slice(start).trim().charAt(0)}'`);
    }
    tokens.push(match[1]);
  }
  return tokens;
}

/**
 * Builds the expression tree for `source`
 *
 * @throws Error on malformed input
 */
export function parseExpression(source: string): Expression {
  const tokens = tokenize(source);
  let position = 0;

  const peek = (): string | undefined => tokens[position];
  const take = (): string | undefined => tokens[position++];

  function expression(): Expression {
    let node = term();
    for (let op = peek(); op === "+" || op === "-"; op = peek()) {
      take();
      node = new BinaryOperation(op, node, term());
    }
    return node;
  }

  function term(): Expression {
    let node = factor();
    for (let op = peek(); op === "*" || op === "/"; op = peek()) {
      take();
      node = new BinaryOperation(op, node, factor());
    }
    return node;
  }

  function factor(): Expression {
    const token = take();
    if (token === undefined) throw new Error("Unexpected end of expression");
    if (token === "-") return new Negate(factor());
    if (token === "(") {
      const inner = expression();
      if (take() !== ")") throw new Error("Expected ')'");
      return inner;
    }
    if (/^\d/.test(token)) return new NumberLiteral(Number(token));
    if (/^[A-Za-z_]/.test(token)) return new Variable(token);
    throw new Error(`Unexpected token: ${token}`);
  }

  const tree = expression();
  const rest = peek();
  if (rest !== undefined) throw new Error(`Unexpected token: ${rest}`);
  return tree;
}

export class InterpreterPatternDemo implements PatternDemo {
  readonly name = "Interpreter";
  readonly description =
    "Defines a grammar as a class hierarchy and evaluates sentences of that language by walking the tree.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("🧮 Arithmetic Expression Interpreter Example");
    const context: Context = new Map([
      ["price", 40],
      ["quantity", 3],
      ["discount", 15],
    ]);
    this.out.writeLine(`📦 Variables: ${[...context].map(([k, v]) => `${k}=${v}`).join(", ")}`);
    this.out.writeLine();

    const sources = [
      "2 + 3 * 4",
      "(2 + 3) * 4",
      "price * quantity - discount",
      "-(price - discount) / 5",
      "total + 1",
    ];
    for (const source of sources) {
      try {
        const tree = parseExpression(source);
        this.out.writeLine(`  ✅ ${source}  =>  ${tree.toString()}  =  ${tree.interpret(context)}`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.out.writeLine(`  ❌ ${source}  =>  ${message}`);
      }
    }
  }
}
