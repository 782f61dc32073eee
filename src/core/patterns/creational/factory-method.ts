/**
 * Factory Method: payment processors chosen at runtime
 */

import { randomUUID } from "node:crypto";
import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

export abstract class PaymentProcessor {
  abstract readonly label: string;

  abstract processPayment(amount: number): string;

  protected reference(prefix: string): string {
    return `${prefix}${randomUUID().slice(0, 8).toUpperCase()}`;
  }
}

export class CreditCardProcessor extends PaymentProcessor {
  readonly label = "credit card";

  processPayment(amount: number): string {
    return `Credit card payment of $${amount.toFixed(2)} processed. Transaction ID: ${this.reference("")}`;
  }
}

export class PayPalProcessor extends PaymentProcessor {
  readonly label = "PayPal";

  processPayment(amount: number): string {
    return `PayPal payment of $${amount.toFixed(2)} processed. Reference: ${this.reference("PP-")}`;
  }
}

export class BankTransferProcessor extends PaymentProcessor {
  readonly label = "bank transfer";

  processPayment(amount: number): string {
    return `Bank transfer of $${amount.toFixed(2)} initiated. Transfer ID: ${this.reference("BT")}`;
  }
}

export class CryptoProcessor extends PaymentProcessor {
  readonly label = "cryptocurrency";

  processPayment(amount: number): string {
    return `Cryptocurrency payment of $${amount.toFixed(2)} confirmed. Block: 0x${this.reference("")}`;
  }
}

export class UnsupportedPaymentTypeError extends Error {
  constructor(paymentType: string) {
    super(`Unsupported payment type: ${paymentType}`);
    this.name = "UnsupportedPaymentTypeError";
  }
}

/**
 * Maps a payment type (case-insensitive, with aliases) to a processor
 *
 * @throws UnsupportedPaymentTypeError for anything it does not know
 */
export function createPaymentProcessor(paymentType: string): PaymentProcessor {
  switch (paymentType.toLowerCase()) {
    case "credit-card":
    case "creditcard":
      return new CreditCardProcessor();
    case "paypal":
      return new PayPalProcessor();
    case "bank-transfer":
    case "banktransfer":
      return new BankTransferProcessor();
    case "crypto":
    case "cryptocurrency":
      return new CryptoProcessor();
    default:
      throw new UnsupportedPaymentTypeError(paymentType);
  }
}

export class FactoryMethodPatternDemo implements PatternDemo {
  readonly name = "Factory Method";
  readonly description =
    "Creates objects without specifying their exact classes. " +
    "Useful when the type of object needs to be determined at runtime " +
    "based on configuration or user input.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("Payment Processing Factory Example");
    this.out.writeLine();

    this.processPayment("credit-card", 150);
    this.processPayment("paypal", 89.99);
    this.processPayment("bank-transfer", 250);
    this.processPayment("crypto", 75.5);
    this.processPayment("carrier-pigeon", 10);
  }

  private processPayment(paymentType: string, amount: number): void {
    try {
      const processor = createPaymentProcessor(paymentType);
      this.out.writeLine(`SUCCESS ${paymentType}: ${processor.processPayment(amount)}`);
    } catch (error) {
      if (!(error instanceof UnsupportedPaymentTypeError)) throw error;
      this.out.writeLine(`ERROR ${paymentType}: ${error.message}`);
    }
    this.out.writeLine();
  }
}
