/**
 * Observer: stock prices and news headlines pushed to subscribers
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";
import { toError } from "../../../utils/errors.js";

export interface PriceChange {
  symbol: string;
  oldPrice: number;
  newPrice: number;
}

export interface StockObserver {
  readonly name: string;
  update(change: PriceChange): void;
}

export class Stock {
  private readonly observers = new Set<StockObserver>();

  constructor(
    readonly symbol: string,
    private current: number
  ) {}

  get price(): number {
    return this.current;
  }

  /** Returns an unsubscribe function */
  subscribe(observer: StockObserver): () => void {
    this.observers.add(observer);
    return () => this.unsubscribe(observer);
  }

  unsubscribe(observer: StockObserver): void {
    this.observers.delete(observer);
  }

  get observerCount(): number {
    return this.observers.size;
  }

  /** Observers are only notified when the price actually moves */
  updatePrice(newPrice: number): void {
    if (newPrice === this.current) return;
    const change: PriceChange = { symbol: this.symbol, oldPrice: this.current, newPrice };
    this.current = newPrice;
    for (const observer of this.observers) {
      observer.update(change);
    }
  }
}

export function percentChange(change: PriceChange): number {
  return ((change.newPrice - change.oldPrice) / change.oldPrice) * 100;
}

export class MobileAppNotifier implements StockObserver {
  constructor(
    readonly name: string,
    private readonly out: DemoOutput
  ) {}

  update(change: PriceChange): void {
    const arrow = change.newPrice > change.oldPrice ? "📈" : "📉";
    this.out.writeLine(`  📱 ${this.name}: ${arrow} ${change.symbol} now $${change.newPrice.toFixed(2)}`);
  }
}

export class EmailNotifier implements StockObserver {
  constructor(
    readonly name: string,
    private readonly out: DemoOutput
  ) {}

  update(change: PriceChange): void {
    this.out.writeLine(
      `  📧 ${this.name}: ${change.symbol} moved ${percentChange(change).toFixed(2)}%`
    );
  }
}

/** Buys on a dip of more than the threshold percentage, sells on a rise past it */
export class TradingBot implements StockObserver {
  readonly decisions: string[] = [];

  constructor(
    readonly name: string,
    private readonly thresholdPercent: number,
    private readonly out: DemoOutput
  ) {}

  update(change: PriceChange): void {
    const percent = percentChange(change);
    let decision = "HOLD";
    if (percent <= -this.thresholdPercent) decision = "BUY";
    else if (percent >= this.thresholdPercent) decision = "SELL";
    this.decisions.push(decision);
    this.out.writeLine(`  🤖 ${this.name}: ${decision} ${change.symbol}`);
  }
}

// =============================================================================
// News
// =============================================================================

export interface NewsObserver {
  readonly name: string;
  onNewsPublished(category: string, headline: string): void;
}

/** Subscriptions are per category */
export class NewsAgency {
  private readonly subscribers = new Map<string, Set<NewsObserver>>();

  constructor(
    readonly name: string,
    private readonly out: DemoOutput
  ) {}

  subscribe(observer: NewsObserver, category: string): void {
    const group = this.subscribers.get(category) ?? new Set<NewsObserver>();
    group.add(observer);
    this.subscribers.set(category, group);
    this.out.writeLine(`  ✅ ${observer.name} subscribed to '${category}' news`);
  }

  unsubscribe(observer: NewsObserver, category: string): boolean {
    const removed = this.subscribers.get(category)?.delete(observer) ?? false;
    if (removed) {
      this.out.writeLine(`  ❌ ${observer.name} unsubscribed from '${category}' news`);
    }
    return removed;
  }

  subscriberCount(category: string): number {
    return this.subscribers.get(category)?.size ?? 0;
  }

  /**
   * Notifies the category's subscribers and returns how many took the news.
   * A subscriber that throws is reported and skipped.
   */
  publish(category: string, headline: string): number {
    this.out.writeLine(`📰 ${this.name} publishing: [${category}] ${headline}`);
    const group = [...(this.subscribers.get(category) ?? [])];
    if (group.length === 0) {
      this.out.writeLine(`  ℹ️ No subscribers for category '${category}'`);
      return 0;
    }

    let delivered = 0;
    for (const subscriber of group) {
      try {
        subscriber.onNewsPublished(category, headline);
        delivered++;
      } catch (error) {
        this.out.writeLine(`  ⚠️ Error notifying ${subscriber.name}: ${toError(error).message}`);
      }
    }
    return delivered;
  }
}

export class NewsWebsite implements NewsObserver {
  constructor(
    readonly name: string,
    private readonly out: DemoOutput
  ) {}

  onNewsPublished(category: string, headline: string): void {
    this.out.writeLine(`  🌐 ${this.name}: Published article in ${category} section`);
    this.out.writeLine(`     📝 Headline: ${headline}`);
  }
}

export class NewsletterService implements NewsObserver {
  static readonly PREVIEW_LENGTH = 50;

  constructor(
    readonly name: string,
    private readonly out: DemoOutput
  ) {}

  onNewsPublished(category: string, headline: string): void {
    this.out.writeLine(`  📧 ${this.name}: Added to upcoming newsletter`);
    this.out.writeLine(`     📄 [${category}] ${headline.slice(0, NewsletterService.PREVIEW_LENGTH)}...`);
  }
}

const HASHTAGS: Readonly<Record<string, string>> = {
  technology: "#tech #innovation #breakthrough",
  business: "#business #finance #economy",
};

export function hashtagsFor(category: string): string {
  return HASHTAGS[category.toLowerCase()] ?? "#news";
}

export class SocialMediaBot implements NewsObserver {
  constructor(
    readonly name: string,
    private readonly out: DemoOutput
  ) {}

  onNewsPublished(category: string, headline: string): void {
    this.out.writeLine(`  🐦 ${this.name}: Posted to social media`);
    this.out.writeLine(`     💬 "${headline}" ${hashtagsFor(category)}`);
  }
}

export class ObserverPatternDemo implements PatternDemo {
  readonly name = "Observer";
  readonly description =
    "Defines a one-to-many dependency between objects so that when one object changes state, " +
    "all its dependents are notified automatically.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("📈 Stock Market Observer Pattern Example");
    this.out.writeLine();

    const stock = new Stock("AAPL", 150);
    const unsubscribeMobile = stock.subscribe(new MobileAppNotifier("StockTracker Mobile", this.out));
    stock.subscribe(new EmailNotifier("alerts@example.com", this.out));
    stock.subscribe(new TradingBot("AutoTrader", 3, this.out));

    this.out.writeLine(`📊 Initial stock price: ${stock.symbol} = $${stock.price.toFixed(2)}`);
    for (const price of [155.25, 148.75]) {
      this.out.writeLine();
      this.out.writeLine(`🔄 Price update: $${price.toFixed(2)}`);
      stock.updatePrice(price);
    }

    this.out.writeLine();
    this.out.writeLine("📱 Mobile app unsubscribing from notifications...");
    unsubscribeMobile();
    this.out.writeLine(`🔄 Price update: $160.50 (${stock.observerCount} observers)`);
    stock.updatePrice(160.5);

    this.out.writeLine();
    this.out.writeLine("📰 News Publisher System:");
    const agency = new NewsAgency("TechNews Central", this.out);
    const website = new NewsWebsite("TechNews.com", this.out);
    const newsletter = new NewsletterService("Weekly Tech Digest", this.out);
    const bot = new SocialMediaBot("@TechNewsBot", this.out);

    agency.subscribe(website, "Technology");
    agency.subscribe(newsletter, "Technology");
    agency.subscribe(bot, "Technology");
    agency.subscribe(website, "Business");
    this.out.writeLine();

    agency.publish("Technology", "New breakthrough in quantum computing announced!");
    this.out.writeLine();
    agency.publish("Business", "Tech giants report record quarterly earnings");
    this.out.writeLine();
    agency.unsubscribe(bot, "Technology");
    agency.publish("Technology", "AI model achieves human-level performance in complex reasoning");
    this.out.writeLine();
    agency.publish("Sports", "Local team wins the cup");
  }
}
