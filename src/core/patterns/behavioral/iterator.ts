/**
 * Iterator: walking a book collection without exposing its storage
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

export interface Book {
  title: string;
  author: string;
}

export interface BookIterator {
  hasNext(): boolean;
  next(): Book;
}

export class BookCollection implements Iterable<Book> {
  private readonly books: Book[] = [];

  add(book: Book): this {
    this.books.push(book);
    return this;
  }

  get size(): number {
    return this.books.length;
  }

  /** Explicit iterator object */
  createIterator(): BookIterator {
    const books = this.books;
    let position = 0;
    return {
      hasNext: () => position < books.length,
      next: () => {
        const book = books[position];
        if (!book) throw new Error("No more elements");
        position++;
        return book;
      },
    };
  }

  /** Iterates newest-first */
  *reversed(): Generator<Book> {
    for (let i = this.books.length - 1; i >= 0; i--) {
      const book = this.books[i];
      if (book) yield book;
    }
  }

  [Symbol.iterator](): Iterator<Book> {
    return this.books[Symbol.iterator]();
  }
}

export class IteratorPatternDemo implements PatternDemo {
  readonly name = "Iterator";
  readonly description = "Provides a way to access elements of a collection sequentially.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("📚 Book Collection Iterator Example");
    const library = new BookCollection()
      .add({ title: "Design Patterns", author: "GoF" })
      .add({ title: "Clean Code", author: "Robert Martin" })
      .add({ title: "Refactoring", author: "Martin Fowler" });

    this.out.writeLine("📖 Iterating through books:");
    const iterator = library.createIterator();
    while (iterator.hasNext()) {
      const book = iterator.next();
      this.out.writeLine(`  📘 ${book.title} by ${book.author}`);
    }

    this.out.writeLine();
    this.out.writeLine("🔄 Using for...of (built-in iterator protocol):");
    for (const book of library) {
      this.out.writeLine(`  📗 ${book.title} by ${book.author}`);
    }

    this.out.writeLine();
    this.out.writeLine("⏪ Using a generator (reverse order):");
    for (const book of library.reversed()) {
      this.out.writeLine(`  📙 ${book.title}`);
    }
  }
}
