/**
 * Prototype: document templates cloned and customised
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

export interface DocumentMetadata {
  author: string;
  version: string;
  tags: string[];
}

export interface CompanyInfo {
  name: string;
  address: string;
  taxId: string;
}

export interface ChartSettings {
  chartType: string;
  showLegend: boolean;
  colors: string[];
}

export interface Prototype<T> {
  clone(): T;
}

export abstract class DocumentTemplate implements Prototype<DocumentTemplate> {
  title = "";
  metadata: DocumentMetadata = { author: "", version: "1.0", tags: [] };

  /** Deep copy: nested metadata and lists are never shared with the clone */
  abstract clone(): DocumentTemplate;

  protected copyBaseInto<T extends DocumentTemplate>(target: T): T {
    target.title = this.title;
    target.metadata = structuredClone(this.metadata);
    return target;
  }
}

export class InvoiceTemplate extends DocumentTemplate {
  companyInfo: CompanyInfo = { name: "", address: "", taxId: "" };
  taxRate = 0.1;

  clone(): InvoiceTemplate {
    const copy = this.copyBaseInto(new InvoiceTemplate());
    copy.companyInfo = { ...this.companyInfo };
    copy.taxRate = this.taxRate;
    return copy;
  }
}

export class ReportTemplate extends DocumentTemplate {
  reportType = "";
  chartSettings: ChartSettings = { chartType: "Bar", showLegend: true, colors: [] };

  clone(): ReportTemplate {
    const copy = this.copyBaseInto(new ReportTemplate());
    copy.reportType = this.reportType;
    copy.chartSettings = structuredClone(this.chartSettings);
    return copy;
  }
}

export function createInvoiceTemplate(): InvoiceTemplate {
  const invoice = new InvoiceTemplate();
  invoice.title = "Standard Invoice Template";
  invoice.metadata = { author: "Finance Department", version: "1.0", tags: ["invoice", "billing", "finance"] };
  invoice.companyInfo = { name: "Acme Corporation", address: "123 Business St", taxId: "TAX123456" };
  return invoice;
}

export function createReportTemplate(): ReportTemplate {
  const report = new ReportTemplate();
  report.title = "Monthly Report Template";
  report.metadata = { author: "Analytics Team", version: "2.1", tags: ["report", "analytics", "monthly"] };
  report.reportType = "Financial Summary";
  report.chartSettings = { chartType: "Bar", showLegend: true, colors: ["#FF6B6B", "#4ECDC4", "#45B7D1"] };
  return report;
}

export class PrototypePatternDemo implements PatternDemo {
  readonly name = "Prototype";
  readonly description =
    "Creates objects by cloning existing instances. " +
    "Useful when object creation is expensive or when you need " +
    "to create objects with similar state to existing ones.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("📄 Document Template Prototype Example");
    this.out.writeLine();

    const invoice = createInvoiceTemplate();
    const report = createReportTemplate();
    this.out.writeLine("🎨 Original Templates Created:");
    this.out.writeLine(`Invoice: ${invoice.title}`);
    this.out.writeLine(`Report: ${report.title}`);
    this.out.writeLine();

    this.out.writeLine("💰 Creating Custom Invoices from Template:");
    for (const customer of ["A", "B"]) {
      const copy = invoice.clone();
      copy.title = `Invoice for Customer ${customer}`;
      copy.metadata.tags.push(`customer-${customer.toLowerCase()}`);
      this.out.writeLine(`  📋 ${copy.title} - Tags: [${copy.metadata.tags.join(", ")}]`);
    }
    this.out.writeLine(`  ✅ Original template unchanged: ${invoice.title} - Tags: [${invoice.metadata.tags.join(", ")}]`);
    this.out.writeLine();

    this.out.writeLine("📊 Creating Custom Reports from Template:");
    const quarterly = report.clone();
    quarterly.title = "Q1 Financial Report";
    quarterly.metadata.version = "2.2";
    quarterly.reportType = "Quarterly Summary";
    quarterly.chartSettings.chartType = "Line";
    this.out.writeLine(`  📈 ${quarterly.title} - Version: ${quarterly.metadata.version} - Chart: ${quarterly.chartSettings.chartType}`);
    this.out.writeLine(`  📈 ${report.title} - Version: ${report.metadata.version} - Chart: ${report.chartSettings.chartType}`);
  }
}
