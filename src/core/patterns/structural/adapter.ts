/**
 * Adapter: third-party payment gateways behind one interface
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

// =============================================================================
// Target interface
// =============================================================================

export interface PaymentRequest {
  amount: number;
  currency: string;
  customerEmail: string;
}

export interface PaymentResult {
  success: boolean;
  transactionId: string;
  message: string;
}

export interface PaymentGateway {
  readonly name: string;
  validate(request: PaymentRequest): boolean;
  process(request: PaymentRequest): PaymentResult;
}

// =============================================================================
// Adaptees (incompatible third-party shapes)
// =============================================================================

export class StripeClient {
  createCharge(charge: { amountInCents: number; currency: string; email: string }): {
    id: string;
    status: "succeeded" | "failed";
    amount: number;
  } {
    return { id: `ch_${randomUUID().replace(/-/g, "").slice(0, 21)}`, status: "succeeded", amount: charge.amountInCents };
  }
}

export class PayPalApi {
  executePayment(payment: { totalAmount: string; currencyCode: string; payerEmail: string }): {
    transactionId: string;
    state: "approved" | "denied";
    total: string;
  } {
    return { transactionId: `PAY-${randomUUID().slice(0, 8).toUpperCase()}`, state: "approved", total: payment.totalAmount };
  }
}

export class SquareProcessor {
  processSquarePayment(details: { amountMoney: { amount: number; currency: string }; buyerEmailAddress: string }): {
    paymentId: string;
    status: "COMPLETED" | "FAILED";
  } {
    return { paymentId: randomUUID(), status: details.amountMoney.amount > 0 ? "COMPLETED" : "FAILED" };
  }
}

// =============================================================================
// Adapters
// =============================================================================

export class StripeAdapter implements PaymentGateway {
  readonly name = "StripeAdapter";

  constructor(private readonly stripe: StripeClient) {}

  validate(request: PaymentRequest): boolean {
    return request.amount > 0 && request.customerEmail.length > 0;
  }

  process(request: PaymentRequest): PaymentResult {
    const charge = this.stripe.createCharge({
      amountInCents: Math.round(request.amount * 100),
      currency: request.currency.toLowerCase(),
      email: request.customerEmail,
    });
    return {
      success: charge.status === "succeeded",
      transactionId: charge.id,
      message: `Stripe payment ${charge.status}`,
    };
  }
}

export class PayPalAdapter implements PaymentGateway {
  readonly name = "PayPalAdapter";

  constructor(private readonly paypal: PayPalApi) {}

  validate(request: PaymentRequest): boolean {
    return request.amount > 0 && request.customerEmail.includes("@");
  }

  process(request: PaymentRequest): PaymentResult {
    const transaction = this.paypal.executePayment({
      totalAmount: request.amount.toFixed(2),
      currencyCode: request.currency,
      payerEmail: request.customerEmail,
    });
    return {
      success: transaction.state === "approved",
      transactionId: transaction.transactionId,
      message: `PayPal payment ${transaction.state} for $${transaction.total}`,
    };
  }
}

export class SquareAdapter implements PaymentGateway {
  readonly name = "SquareAdapter";

  constructor(private readonly square: SquareProcessor) {}

  /** Square enforces a minimum charge of one unit */
  validate(request: PaymentRequest): boolean {
    return request.amount >= 1;
  }

  process(request: PaymentRequest): PaymentResult {
    const response = this.square.processSquarePayment({
      amountMoney: { amount: Math.round(request.amount * 100), currency: request.currency },
      buyerEmailAddress: request.customerEmail,
    });
    return {
      success: response.status === "COMPLETED",
      transactionId: response.paymentId,
      message: `Square payment ${response.status}`,
    };
  }
}

// =============================================================================
// Data sources
// =============================================================================

export interface DataSource {
  readonly name: string;
  getRecords(query: string): string[];
}

export class XmlFeed {
  getXml(entity: string): string {
    return `<${entity}><item>John Doe</item><item>Jane Smith</item></${entity}>`;
  }
}

export class JsonService {
  retrieveJson(_table: string): string {
    return JSON.stringify({ data: [{ name: "Alice Johnson" }, { name: "Bob Wilson" }] });
  }
}

export class CsvExport {
  getCsv(_dataSet: string): string {
    return "name\nCharlie Brown\nDiana Prince";
  }
}

export class XmlDataAdapter implements DataSource {
  readonly name = "XmlDataAdapter";

  constructor(private readonly feed: XmlFeed) {}

  getRecords(query: string): string[] {
    const xml = this.feed.getXml(query);
    return [...xml.matchAll(/<item>(.*?)<\/item>/g)].map((match) => `${match[1] ?? ""} (from XML)`);
  }
}

const JsonPayloadSchema = z.object({
  data: z.array(z.object({ name: z.string() })),
});

export class JsonDataAdapter implements DataSource {
  readonly name = "JsonDataAdapter";

  constructor(private readonly service: JsonService) {}

  getRecords(query: string): string[] {
    const payload = JsonPayloadSchema.parse(JSON.parse(this.service.retrieveJson(query)));
    return payload.data.map((row) => `${row.name} (from JSON)`);
  }
}

export class CsvDataAdapter implements DataSource {
  readonly name = "CsvDataAdapter";

  constructor(private readonly csv: CsvExport) {}

  /** First line is the header */
  getRecords(query: string): string[] {
    return this.csv
      .getCsv(query)
      .split("\n")
      .slice(1)
      .filter((line) => line.trim() !== "")
      .map((line) => `${line} (from CSV)`);
  }
}

export class AdapterPatternDemo implements PatternDemo {
  readonly name = "Adapter";
  readonly description =
    "Allows incompatible interfaces to work together. " +
    "Useful when integrating with third-party libraries or legacy systems " +
    "that have different interfaces than what your application expects.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("🔌 Payment Gateway Adapter Example");
    this.out.writeLine();
    this.out.writeLine("💳 Processing payments through different gateways:");

    const gateways: PaymentGateway[] = [
      new StripeAdapter(new StripeClient()),
      new PayPalAdapter(new PayPalApi()),
      new SquareAdapter(new SquareProcessor()),
    ];
    const request: PaymentRequest = {
      amount: 99.99,
      currency: "USD",
      customerEmail: "customer@example.com",
    };

    for (const gateway of gateways) {
      if (!gateway.validate(request)) {
        this.out.writeLine(`  ❌ ${gateway.name}: request rejected`);
        continue;
      }
      const result = gateway.process(request);
      this.out.writeLine(`  ${result.success ? "✅" : "❌"} ${gateway.name}: ${result.message}`);
      this.out.writeLine(`     Transaction ID: ${result.transactionId}`);
    }

    this.out.writeLine();
    this.out.writeLine("📊 Data Source Adapter Example:");
    const sources: DataSource[] = [
      new XmlDataAdapter(new XmlFeed()),
      new JsonDataAdapter(new JsonService()),
      new CsvDataAdapter(new CsvExport()),
    ];
    for (const source of sources) {
      const records = source.getRecords("users");
      this.out.writeLine(`  📁 ${source.name}: Retrieved ${records.length} records`);
      for (const record of records) {
        this.out.writeLine(`     • ${record}`);
      }
    }
  }
}
