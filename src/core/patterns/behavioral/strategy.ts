/**
 * Strategy: interchangeable shipping cost, payment and sorting algorithms
 */

import { randomUUID } from "node:crypto";
import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

// =============================================================================
// Shipping
// =============================================================================

export interface Package {
  /** Pounds */
  weight: number;
  /** Inches */
  dimensions: { length: number; width: number; height: number };
  fragile: boolean;
}

export interface ShippingStrategy {
  readonly name: string;
  calculateCost(pkg: Package): number;
  estimatedDelivery(): string;
}

const OVERSIZE_VOLUME = 500;
const OVERSIZE_CHARGE = 5;
const FRAGILE_CHARGE = 3;

function handlingCharges(pkg: Package): number {
  const { length, width, height } = pkg.dimensions;
  const oversize = length * width * height > OVERSIZE_VOLUME ? OVERSIZE_CHARGE : 0;
  return oversize + (pkg.fragile ? FRAGILE_CHARGE : 0);
}

function rateStrategy(
  name: string,
  ratePerPound: number,
  flatFee: number,
  delivery: string
): ShippingStrategy {
  return {
    name,
    calculateCost: (pkg) => pkg.weight * ratePerPound + handlingCharges(pkg) + flatFee,
    estimatedDelivery: () => delivery,
  };
}

export const standardShipping = rateStrategy("Standard", 2.5, 0, "5-7 business days");
export const expressShipping = rateStrategy("Express", 5, 10, "2-3 business days");
export const overnightShipping = rateStrategy("Overnight", 8, 25, "Next business day by 10:30 AM");
/** Flat fee covers the international fee plus customs */
export const internationalShipping = rateStrategy("International", 12, 45, "7-14 business days (customs dependent)");

export class ShippingCalculator {
  constructor(private strategy: ShippingStrategy = standardShipping) {}

  setStrategy(strategy: ShippingStrategy): void {
    this.strategy = strategy;
  }

  quote(pkg: Package): { strategy: string; cost: number; delivery: string } {
    return {
      strategy: this.strategy.name,
      cost: this.strategy.calculateCost(pkg),
      delivery: this.strategy.estimatedDelivery(),
    };
  }
}

// =============================================================================
// Payment
// =============================================================================

export interface PaymentOutcome {
  success: boolean;
  message: string;
  reference: string;
}

export interface PaymentStrategy {
  readonly name: string;
  validate(): boolean;
  pay(amount: number): PaymentOutcome;
}

function reference(prefix: string): string {
  return `${prefix}${randomUUID().replace(/-/g, "").slice(0, 12).toUpperCase()}`;
}

export class CreditCardPayment implements PaymentStrategy {
  readonly name = "Credit Card";

  constructor(
    private readonly cardNumber: string,
    private readonly cardHolder: string,
    private readonly cvv: string
  ) {}

  validate(): boolean {
    return this.cardNumber !== "" && this.cardHolder !== "" && this.cvv !== "";
  }

  pay(amount: number): PaymentOutcome {
    return {
      success: true,
      message: `Credit card payment of $${amount.toFixed(2)} processed successfully`,
      reference: reference("CC"),
    };
  }
}

export class PayPalPayment implements PaymentStrategy {
  readonly name = "PayPal";

  constructor(private readonly email: string) {}

  validate(): boolean {
    return this.email.includes("@");
  }

  pay(amount: number): PaymentOutcome {
    return {
      success: true,
      message: `PayPal payment of $${amount.toFixed(2)} processed via ${this.email}`,
      reference: reference("PP"),
    };
  }
}

export class BankTransferPayment implements PaymentStrategy {
  readonly name = "Bank Transfer";

  constructor(
    private readonly accountNumber: string,
    private readonly routingNumber: string
  ) {}

  validate(): boolean {
    return this.accountNumber !== "" && this.routingNumber !== "";
  }

  pay(amount: number): PaymentOutcome {
    return {
      success: true,
      message: `Bank transfer of $${amount.toFixed(2)} initiated`,
      reference: reference("BT"),
    };
  }
}

const MIN_WALLET_LENGTH = 26;

export class CryptoPayment implements PaymentStrategy {
  readonly name = "Crypto";

  constructor(private readonly walletAddress: string) {}

  validate(): boolean {
    return this.walletAddress.length >= MIN_WALLET_LENGTH;
  }

  pay(amount: number): PaymentOutcome {
    return {
      success: true,
      message: `Cryptocurrency payment of $${amount.toFixed(2)} initiated`,
      reference: reference("0x"),
    };
  }
}

/**
 * Context that charges through whichever payment strategy is set
 */
export class PaymentProcessor {
  private strategy: PaymentStrategy | undefined;

  setStrategy(strategy: PaymentStrategy): void {
    this.strategy = strategy;
  }

  process(amount: number): PaymentOutcome {
    if (!this.strategy) {
      return { success: false, message: "No payment strategy set", reference: "" };
    }
    if (!this.strategy.validate()) {
      return { success: false, message: "Invalid payment details", reference: "" };
    }
    return this.strategy.pay(amount);
  }
}

// =============================================================================
// Sorting
// =============================================================================

export interface SortStrategy {
  readonly name: string;
  /** Returns a sorted copy; the input is left untouched */
  sort(values: readonly number[]): number[];
}

export const bubbleSort: SortStrategy = {
  name: "Bubble Sort",
  sort(values) {
    const result = [...values];
    for (let end = result.length - 1; end > 0; end--) {
      for (let i = 0; i < end; i++) {
        const a = result[i];
        const b = result[i + 1];
        if (a !== undefined && b !== undefined && a > b) {
          result[i] = b;
          result[i + 1] = a;
        }
      }
    }
    return result;
  },
};

export const quickSort: SortStrategy = {
  name: "Quick Sort",
  sort(values) {
    const [pivot, ...rest] = values;
    if (pivot === undefined) return [];
    return [
      ...quickSort.sort(rest.filter((v) => v < pivot)),
      pivot,
      ...quickSort.sort(rest.filter((v) => v >= pivot)),
    ];
  },
};

export const mergeSort: SortStrategy = {
  name: "Merge Sort",
  sort(values) {
    if (values.length <= 1) return [...values];
    const middle = Math.floor(values.length / 2);
    const left = mergeSort.sort(values.slice(0, middle));
    const right = mergeSort.sort(values.slice(middle));
    const merged: number[] = [];
    let i = 0;
    let j = 0;
    while (i < left.length || j < right.length) {
      const l = left[i];
      const r = right[j];
      if (r === undefined || (l !== undefined && l <= r)) {
        if (l !== undefined) merged.push(l);
        i++;
      } else {
        merged.push(r);
        j++;
      }
    }
    return merged;
  },
};

export class StrategyPatternDemo implements PatternDemo {
  readonly name = "Strategy";
  readonly description =
    "Defines a family of algorithms, encapsulates each one, and makes them interchangeable. " +
    "Useful when a task can be performed several ways and the algorithm is chosen at runtime.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("📦 Shipping Cost Calculation Strategy Example");
    this.out.writeLine();

    const pkg: Package = {
      weight: 5.5,
      dimensions: { length: 12, width: 8, height: 6 },
      fragile: true,
    };
    const calculator = new ShippingCalculator();
    for (const strategy of [standardShipping, expressShipping, overnightShipping, internationalShipping]) {
      calculator.setStrategy(strategy);
      const quote = calculator.quote(pkg);
      this.out.writeLine(`  📋 ${quote.strategy}:`);
      this.out.writeLine(`     💰 Cost: $${quote.cost.toFixed(2)}`);
      this.out.writeLine(`     📅 Delivery: ${quote.delivery}`);
    }
    this.out.writeLine();

    this.out.writeLine("💳 Payment Processing Strategies:");
    const processor = new PaymentProcessor();
    const payments: PaymentStrategy[] = [
      new CreditCardPayment("4111-1111-1111-1111", "Test Holder", "000"),
      new PayPalPayment("buyer@example.com"),
      new BankTransferPayment("000123456", "000654321"),
      new CryptoPayment("test-wallet-0000000000000000000000"),
    ];
    for (const strategy of payments) {
      processor.setStrategy(strategy);
      const outcome = processor.process(250);
      this.out.writeLine(`  ${strategy.name}:`);
      this.out.writeLine(`     ${outcome.success ? "✅" : "❌"} ${outcome.message}`);
      this.out.writeLine(`     🆔 Reference: ${outcome.reference}`);
    }
    this.out.writeLine();

    this.out.writeLine("🔢 Data Sorting Strategies:");
    const numbers = [64, 34, 25, 12, 22, 11, 90, 5];
    this.out.writeLine(`  📊 Original data: [${numbers.join(", ")}]`);
    for (const strategy of [bubbleSort, quickSort, mergeSort]) {
      this.out.writeLine(`  ${strategy.name}: [${strategy.sort(numbers).join(", ")}]`);
    }
  }
}
