/**
 * Chain of Responsibility: support tickets escalated through levels
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

export interface SupportTicket {
  issue: string;
  /** 1 = basic, 2 = technical, 3+ = critical */
  priority: number;
}

export abstract class SupportHandler {
  private next: SupportHandler | null = null;

  /** Returns the handler passed in so calls can be chained */
  setNext(handler: SupportHandler): SupportHandler {
    this.next = handler;
    return handler;
  }

  /** Name of the handler that took the ticket, or null when nobody did */
  handle(ticket: SupportTicket): string | null {
    if (this.canHandle(ticket)) return this.label;
    return this.next ? this.next.handle(ticket) : null;
  }

  protected abstract readonly label: string;
  protected abstract canHandle(ticket: SupportTicket): boolean;
}

export class Level1Support extends SupportHandler {
  protected readonly label = "👨‍💻 Level 1 Support: Handling basic issue";
  protected canHandle(ticket: SupportTicket): boolean {
    return ticket.priority <= 1;
  }
}

export class Level2Support extends SupportHandler {
  protected readonly label = "👨‍🔧 Level 2 Support: Handling technical issue";
  protected canHandle(ticket: SupportTicket): boolean {
    return ticket.priority === 2;
  }
}

export class Level3Support extends SupportHandler {
  protected readonly label = "👨‍🚀 Level 3 Support: Handling critical issue";
  protected canHandle(ticket: SupportTicket): boolean {
    return ticket.priority >= 3;
  }
}

export function createSupportChain(): SupportHandler {
  const chain = new Level1Support();
  chain.setNext(new Level2Support()).setNext(new Level3Support());
  return chain;
}

export class ChainOfResponsibilityPatternDemo implements PatternDemo {
  readonly name = "Chain of Responsibility";
  readonly description = "Passes requests along a chain of handlers until one handles it.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("⛓️ Support Ticket Chain Example");
    const chain = createSupportChain();
    const tickets: SupportTicket[] = [
      { issue: "Password reset", priority: 1 },
      { issue: "Server crash", priority: 3 },
      { issue: "App bug", priority: 2 },
      { issue: "Security breach", priority: 3 },
    ];

    for (const ticket of tickets) {
      this.out.writeLine();
      this.out.writeLine(`🎫 Processing: ${ticket.issue} (Level ${ticket.priority})`);
      this.out.writeLine(chain.handle(ticket) ?? "❌ No handler available for this ticket");
    }
  }
}
