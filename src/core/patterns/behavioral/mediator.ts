/**
 * Mediator: chat participants talk through the room, never directly
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

export interface ChatMediator {
  addUser(user: ChatUser): void;
  sendMessage(message: string, sender: ChatUser): void;
}

export class ChatRoom implements ChatMediator {
  private readonly users: ChatUser[] = [];

  constructor(private readonly out: DemoOutput) {}

  addUser(user: ChatUser): void {
    this.users.push(user);
    this.out.writeLine(`👋 ${user.name} joined the chat`);
  }

  sendMessage(message: string, sender: ChatUser): void {
    for (const user of this.users) {
      if (user !== sender) user.receive(message, sender.name);
    }
  }
}

export class ChatUser {
  readonly inbox: string[] = [];

  constructor(
    readonly name: string,
    private readonly mediator: ChatMediator,
    private readonly out: DemoOutput
  ) {
    mediator.addUser(this);
  }

  send(message: string): void {
    this.out.writeLine(`📤 ${this.name}: ${message}`);
    this.mediator.sendMessage(message, this);
  }

  receive(message: string, from: string): void {
    this.inbox.push(`${from}: ${message}`);
    this.out.writeLine(`📥 ${this.name} received from ${from}: ${message}`);
  }
}

export class MediatorPatternDemo implements PatternDemo {
  readonly name = "Mediator";
  readonly description = "Defines how objects interact with each other through a mediator.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("💬 Chat Room Mediator Example");
    const room = new ChatRoom(this.out);
    const alice = new ChatUser("Alice", room, this.out);
    const bob = new ChatUser("Bob", room, this.out);
    const charlie = new ChatUser("Charlie", room, this.out);

    alice.send("Hello everyone!");
    bob.send("Hi Alice!");
    charlie.send("Hey there!");
  }
}
