/**
 * Tests for the behavioral pattern participants
 */

import { describe, it, expect } from "vitest";
import { RecordingOutput } from "../../../__tests__/helpers.js";
import { createSupportChain, Level2Support } from "../behavioral/chain-of-responsibility.js";
import {
  CommandScheduler,
  MacroCommand,
  SetBrightnessCommand,
  SetTemperatureCommand,
  SmartHomeRemote,
  SmartLight,
  SmartThermostat,
  formatClock,
} from "../behavioral/command.js";
import { parseExpression, tokenize } from "../behavioral/interpreter.js";
import { BookCollection } from "../behavioral/iterator.js";
import { ChatRoom, ChatUser } from "../behavioral/mediator.js";
import { EditorHistory, TextEditor } from "../behavioral/memento.js";
import {
  EmailNotifier,
  NewsAgency,
  NewsletterService,
  SocialMediaBot,
  Stock,
  TradingBot,
  hashtagsFor,
  type NewsObserver,
  type PriceChange,
  type StockObserver,
} from "../behavioral/observer.js";
import { TrafficLight } from "../behavioral/state.js";
import {
  BankTransferPayment,
  CreditCardPayment,
  CryptoPayment,
  PayPalPayment,
  PaymentProcessor,
  ShippingCalculator,
  bubbleSort,
  expressShipping,
  internationalShipping,
  mergeSort,
  overnightShipping,
  quickSort,
  standardShipping,
  type Package,
} from "../behavioral/strategy.js";
import { BlackCoffee, Tea } from "../behavioral/template-method.js";
import {
  Circle,
  Rectangle,
  RightTriangle,
  areaCalculator,
  perimeterCalculator,
  shapeLabel,
} from "../behavioral/visitor.js";

// =============================================================================
// Chain of Responsibility
// =============================================================================

describe("Chain of Responsibility", () => {
  it("should pass each ticket to the first handler that accepts it", () => {
    const chain = createSupportChain();

    expect(chain.handle({ issue: "Password reset", priority: 1 })).toBe("👨‍💻 Level 1 Support: Handling basic issue");
    expect(chain.handle({ issue: "App bug", priority: 2 })).toBe("👨‍🔧 Level 2 Support: Handling technical issue");
    expect(chain.handle({ issue: "Outage", priority: 5 })).toBe("👨‍🚀 Level 3 Support: Handling critical issue");
  });

  it("should return null when the chain ends without a taker", () => {
    expect(new Level2Support().handle({ issue: "Outage", priority: 3 })).toBeNull();
  });
});

// =============================================================================
// Command
// =============================================================================

describe("Command", () => {
  it("should undo commands in reverse order of execution", () => {
    const out = new RecordingOutput();
    const light = new SmartLight("Hall", out);
    const thermostat = new SmartThermostat(out);
    const remote = new SmartHomeRemote();

    remote.run(new SetBrightnessCommand(light, 80));
    remote.run(new SetTemperatureCommand(thermostat, 65));
    expect(remote.historySize).toBe(2);

    expect(remote.undoLast()).toBe(true);
    expect(thermostat.temperature).toBe(70);
    expect(remote.undoLast()).toBe(true);
    expect(light.brightness).toBe(0);
    expect(remote.undoLast()).toBe(false);
  });

  it("should undo a macro as one step", () => {
    const out = new RecordingOutput();
    const light = new SmartLight("Den", out);
    light.setBrightness(40);
    const remote = new SmartHomeRemote();

    remote.run(
      new MacroCommand("Dim twice", [new SetBrightnessCommand(light, 20), new SetBrightnessCommand(light, 10)])
    );
    expect(light.brightness).toBe(10);

    remote.undoLast();
    expect(light.brightness).toBe(40);
    expect(out.lines.at(-1)).toBe("  💡 Den light ON at 40%");
  });

  it("should label commands by what they do", () => {
    const out = new RecordingOutput();
    expect(new SetBrightnessCommand(new SmartLight("Den", out), 0).label).toBe("Light off");
    expect(new SetTemperatureCommand(new SmartThermostat(out), 68).label).toBe("Temperature 68°F");
  });
});

describe("CommandScheduler", () => {
  it("should run only due commands, earliest first", () => {
    const out = new RecordingOutput();
    const light = new SmartLight("Hall", out);
    const thermostat = new SmartThermostat(out);
    const scheduler = new CommandScheduler(out);

    scheduler.schedule(new SetBrightnessCommand(light, 50), 420, "Lights");
    scheduler.schedule(new SetTemperatureCommand(thermostat, 66), 400, "Heat");
    scheduler.schedule(new SetBrightnessCommand(light, 0), 480, "Lights out");
    out.lines.length = 0;

    expect(scheduler.runDue(420)).toBe(2);
    expect(scheduler.pending).toBe(1);
    expect(out.lines).toEqual([
      "    ⏰ Executing scheduled: Heat",
      "  🌡️ Thermostat set to 66°F",
      "    ⏰ Executing scheduled: Lights",
      "  💡 Hall light ON at 50%",
    ]);
  });

  it("should report when nothing is due", () => {
    const out = new RecordingOutput();
    const scheduler = new CommandScheduler(out);
    scheduler.schedule(new SetTemperatureCommand(new SmartThermostat(out), 70), 600);

    expect(out.lines).toEqual(["    📅 Scheduled: Temperature 70°F at 10:00"]);
    expect(scheduler.runDue(599)).toBe(0);
    expect(out.lines.at(-1)).toBe("    ℹ️ No commands ready for execution");
    expect(scheduler.pending).toBe(1);
  });

  it("should format the clock as HH:MM", () => {
    expect(formatClock(425)).toBe("07:05");
    expect(formatClock(0)).toBe("00:00");
    expect(formatClock(1439)).toBe("23:59");
  });
});

// =============================================================================
// Interpreter
// =============================================================================

describe("Interpreter", () => {
  const context = new Map([
    ["price", 40],
    ["discount", 15],
  ]);

  it("should respect operator precedence", () => {
    const tree = parseExpression("2 + 3 * 4");
    expect(tree.toString()).toBe("(2 + (3 * 4))");
    expect(tree.interpret(context)).toBe(14);
  });

  it("should honour parentheses and unary minus", () => {
    expect(parseExpression("(2 + 3) * 4").interpret(context)).toBe(20);

    const tree = parseExpression("-(price - discount) / 5");
    expect(tree.toString()).toBe("((-(price - discount)) / 5)");
    expect(tree.interpret(context)).toBe(-5);
  });

  it("should tokenize numbers, names and operators", () => {
    expect(tokenize(" 1.5*rate+(x) ")).toEqual(["1.5", "*", "rate", "+", "(", "x", ")"]);
  });

  it.each([
    ["total + 1", "Undefined variable: total"],
    ["4 / (2 - 2)", "Division by zero"],
    ["3 +", "Unexpected end of expression"],
    ["(1 + 2", "Expected ')'"],
    ["1 2", "Unexpected token: 2"],
    ["2 $ 3", "Unexpected character at position 1: '$'"],
  ])("should report %s as an error", (source, message) => {
    expect(() => parseExpression(source).interpret(context)).toThrow(message);
  });
});

// =============================================================================
// Iterator
// =============================================================================

describe("Iterator", () => {
  function library(): BookCollection {
    return new BookCollection()
      .add({ title: "First", author: "A" })
      .add({ title: "Second", author: "B" })
      .add({ title: "Third", author: "C" });
  }

  it("should visit books in insertion order with an explicit iterator", () => {
    const iterator = library().createIterator();
    const titles: string[] = [];
    while (iterator.hasNext()) titles.push(iterator.next().title);

    expect(titles).toEqual(["First", "Second", "Third"]);
    expect(() => iterator.next()).toThrow("No more elements");
  });

  it("should support for...of and reverse iteration", () => {
    const books = library();
    expect([...books].map((book) => book.title)).toEqual(["First", "Second", "Third"]);
    expect([...books.reversed()].map((book) => book.title)).toEqual(["Third", "Second", "First"]);
    expect(books.size).toBe(3);
  });
});

// =============================================================================
// Mediator
// =============================================================================

describe("Mediator", () => {
  it("should deliver messages to everyone except the sender", () => {
    const out = new RecordingOutput();
    const room = new ChatRoom(out);
    const ann = new ChatUser("Ann", room, out);
    const ben = new ChatUser("Ben", room, out);
    const cal = new ChatUser("Cal", room, out);

    ann.send("hi");

    expect(ann.inbox).toEqual([]);
    expect(ben.inbox).toEqual(["Ann: hi"]);
    expect(cal.inbox).toEqual(["Ann: hi"]);
    expect(out.lines.slice(0, 3)).toEqual(["👋 Ann joined the chat", "👋 Ben joined the chat", "👋 Cal joined the chat"]);
  });
});

// =============================================================================
// Memento
// =============================================================================

describe("Memento", () => {
  it("should restore saved states newest first", () => {
    const editor = new TextEditor();
    const history = new EditorHistory();

    editor.write("Hello");
    history.save(editor);
    editor.write(" World");
    history.save(editor);
    editor.write("!!!");

    expect(editor.content).toBe("Hello World!!!");
    expect(history.undo(editor)).toBe(true);
    expect(editor.content).toBe("Hello World");
    expect(history.undo(editor)).toBe(true);
    expect(editor.content).toBe("Hello");
    expect(history.undo(editor)).toBe(false);
    expect(editor.content).toBe("Hello");
  });

  it("should freeze snapshots", () => {
    const editor = new TextEditor();
    editor.write("draft");
    expect(Object.isFrozen(editor.save())).toBe(true);
  });
});

// =============================================================================
// Observer
// =============================================================================

describe("Observer", () => {
  class Recorder implements StockObserver {
    readonly name = "recorder";
    readonly changes: PriceChange[] = [];
    update(change: PriceChange): void {
      this.changes.push(change);
    }
  }

  it("should notify subscribers of each price move", () => {
    const stock = new Stock("TEST", 100);
    const recorder = new Recorder();
    stock.subscribe(recorder);

    stock.updatePrice(110);
    stock.updatePrice(110);

    expect(recorder.changes).toEqual([{ symbol: "TEST", oldPrice: 100, newPrice: 110 }]);
    expect(stock.price).toBe(110);
  });

  it("should stop notifying after unsubscribe", () => {
    const stock = new Stock("TEST", 100);
    const recorder = new Recorder();
    const unsubscribe = stock.subscribe(recorder);

    unsubscribe();
    stock.updatePrice(120);

    expect(recorder.changes).toEqual([]);
    expect(stock.observerCount).toBe(0);
  });

  it("should let the trading bot decide on the percentage move", () => {
    const out = new RecordingOutput();
    const bot = new TradingBot("bot", 5, out);
    const stock = new Stock("TEST", 100);
    stock.subscribe(bot);

    stock.updatePrice(110);
    stock.updatePrice(90);
    stock.updatePrice(91);

    expect(bot.decisions).toEqual(["SELL", "BUY", "HOLD"]);
    expect(out.lines[0]).toBe("  🤖 bot: SELL TEST");
  });

  it("should format the percentage in email alerts", () => {
    const out = new RecordingOutput();
    new EmailNotifier("ops@example.com", out).update({ symbol: "TEST", oldPrice: 200, newPrice: 150 });
    expect(out.lines).toEqual(["  📧 ops@example.com: TEST moved -25.00%"]);
  });
});

describe("Observer news agency", () => {
  class Inbox implements NewsObserver {
    readonly headlines: string[] = [];
    constructor(readonly name: string) {}
    onNewsPublished(category: string, headline: string): void {
      this.headlines.push(`[${category}] ${headline}`);
    }
  }

  it("should deliver news only to the category's subscribers", () => {
    const agency = new NewsAgency("Wire", new RecordingOutput());
    const tech = new Inbox("tech");
    const business = new Inbox("business");
    agency.subscribe(tech, "Technology");
    agency.subscribe(business, "Business");

    expect(agency.publish("Technology", "Chips get faster")).toBe(1);
    expect(tech.headlines).toEqual(["[Technology] Chips get faster"]);
    expect(business.headlines).toEqual([]);
  });

  it("should report a category nobody follows", () => {
    const out = new RecordingOutput();
    const agency = new NewsAgency("Wire", out);

    expect(agency.publish("Sports", "Final score")).toBe(0);
    expect(out.lines).toEqual(["📰 Wire publishing: [Sports] Final score", "  ℹ️ No subscribers for category 'Sports'"]);
  });

  it("should keep notifying after a subscriber throws", () => {
    const out = new RecordingOutput();
    const agency = new NewsAgency("Wire", out);
    const failing: NewsObserver = {
      name: "flaky",
      onNewsPublished: () => {
        throw new Error("offline");
      },
    };
    const steady = new Inbox("steady");
    agency.subscribe(failing, "Technology");
    agency.subscribe(steady, "Technology");

    expect(agency.publish("Technology", "Update")).toBe(1);
    expect(out.lines).toContain("  ⚠️ Error notifying flaky: offline");
    expect(steady.headlines).toEqual(["[Technology] Update"]);
  });

  it("should only report removals that happened", () => {
    const agency = new NewsAgency("Wire", new RecordingOutput());
    const inbox = new Inbox("reader");
    agency.subscribe(inbox, "Technology");

    expect(agency.unsubscribe(inbox, "Business")).toBe(false);
    expect(agency.unsubscribe(inbox, "Technology")).toBe(true);
    expect(agency.subscriberCount("Technology")).toBe(0);
  });

  it("should format newsletter previews and hashtags", () => {
    const out = new RecordingOutput();
    new NewsletterService("Digest", out).onNewsPublished("Business", "x".repeat(60));
    new SocialMediaBot("@bot", out).onNewsPublished("TECHNOLOGY", "Launch");

    expect(out.lines).toEqual([
      "  📧 Digest: Added to upcoming newsletter",
      `     📄 [Business] ${"x".repeat(50)}...`,
      "  🐦 @bot: Posted to social media",
      '     💬 "Launch" #tech #innovation #breakthrough',
    ]);
    expect(hashtagsFor("Weather")).toBe("#news");
  });
});

// =============================================================================
// State
// =============================================================================

describe("State", () => {
  it("should cycle red, green, yellow and back to red", () => {
    const light = new TrafficLight();
    expect(light.color).toBe("red");

    expect(light.request()).toBe("🔴 RED - Stop! Changing to Green...");
    expect(light.color).toBe("green");
    expect(light.request()).toBe("🟢 GREEN - Go! Changing to Yellow...");
    expect(light.color).toBe("yellow");
    expect(light.request()).toBe("🟡 YELLOW - Caution! Changing to Red...");
    expect(light.color).toBe("red");
  });
});

// =============================================================================
// Strategy
// =============================================================================

describe("Strategy payments", () => {
  it("should refuse to charge without a strategy", () => {
    expect(new PaymentProcessor().process(10)).toEqual({
      success: false,
      message: "No payment strategy set",
      reference: "",
    });
  });

  it("should charge through whichever strategy is set", () => {
    const processor = new PaymentProcessor();

    processor.setStrategy(new PayPalPayment("buyer@example.com"));
    const paypal = processor.process(250);
    expect(paypal.message).toBe("PayPal payment of $250.00 processed via buyer@example.com");
    expect(paypal.reference).toMatch(/^PP[0-9A-F]{12}$/);

    processor.setStrategy(new BankTransferPayment("111", "222"));
    expect(processor.process(12.5).message).toBe("Bank transfer of $12.50 initiated");
  });

  it("should reject invalid payment details", () => {
    const processor = new PaymentProcessor();
    const invalid = [
      new CreditCardPayment("4111", "", "000"),
      new PayPalPayment("buyer"),
      new BankTransferPayment("", "222"),
      new CryptoPayment("short-wallet"),
    ];

    for (const strategy of invalid) {
      processor.setStrategy(strategy);
      expect(processor.process(1)).toEqual({ success: false, message: "Invalid payment details", reference: "" });
    }
  });

  it("should accept a wallet address of 26 characters", () => {
    expect(new CryptoPayment("w".repeat(26)).validate()).toBe(true);
    expect(new CryptoPayment("w".repeat(25)).validate()).toBe(false);
  });
});

describe("Strategy", () => {
  const fragileBox: Package = {
    weight: 5.5,
    dimensions: { length: 12, width: 8, height: 6 },
    fragile: true,
  };

  it.each([
    [standardShipping, 21.75],
    [expressShipping, 45.5],
    [overnightShipping, 77],
    [internationalShipping, 119],
  ])("should price a fragile oversize box with %s", (strategy, cost) => {
    expect(strategy.calculateCost(fragileBox)).toBe(cost);
  });

  it("should skip handling charges for a small sturdy box", () => {
    const small: Package = { weight: 2, dimensions: { length: 5, width: 5, height: 5 }, fragile: false };
    expect(standardShipping.calculateCost(small)).toBe(5);
  });

  it("should quote with whichever strategy is set", () => {
    const calculator = new ShippingCalculator();
    expect(calculator.quote(fragileBox).strategy).toBe("Standard");

    calculator.setStrategy(overnightShipping);
    expect(calculator.quote(fragileBox)).toEqual({
      strategy: "Overnight",
      cost: 77,
      delivery: "Next business day by 10:30 AM",
    });
  });

  it.each([bubbleSort, quickSort, mergeSort])("should sort a copy with $name", (strategy) => {
    const input = [64, 34, 25, 12, 22, 11, 90, 5, 34];
    expect(strategy.sort(input)).toEqual([5, 11, 12, 22, 25, 34, 34, 64, 90]);
    expect(input[0]).toBe(64);
    expect(strategy.sort([])).toEqual([]);
  });
});

// =============================================================================
// Template Method
// =============================================================================

describe("Template Method", () => {
  it("should run the fixed steps with the subclass's brew and condiments", () => {
    const out = new RecordingOutput();
    new Tea(out).prepareRecipe();
    expect(out.lines).toEqual(["💧 Boiling water", "🍵 Steeping the tea", "🥤 Pouring into cup", "🍋 Adding lemon"]);
  });

  it("should let the hook skip condiments", () => {
    const out = new RecordingOutput();
    new BlackCoffee(out).prepareRecipe();
    expect(out.lines).toEqual(["💧 Boiling water", "☕ Dripping coffee through filter", "🥤 Pouring into cup"]);
  });
});

// =============================================================================
// Visitor
// =============================================================================

describe("Visitor", () => {
  it("should compute area and perimeter without methods on the shapes", () => {
    expect(new Rectangle(4, 6).accept(areaCalculator)).toBe(24);
    expect(new Rectangle(4, 6).accept(perimeterCalculator)).toBe(20);
    expect(new RightTriangle(3, 4).accept(areaCalculator)).toBe(6);
    expect(new RightTriangle(3, 4).accept(perimeterCalculator)).toBe(12);
    expect(new Circle(1).accept(areaCalculator)).toBeCloseTo(Math.PI);
  });

  it("should dispatch to the visitor method for each shape", () => {
    expect(new Circle(2).accept(shapeLabel)).toBe("🔵 Circle");
    expect(new RightTriangle(1, 1).accept(shapeLabel)).toBe("🔺 Triangle");
  });
});
