/**
 * Composite: a file system tree where folders and files share one interface
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

export interface FileSystemItem {
  readonly name: string;
  /** Size in KB */
  getSize(): number;
  render(depth?: number): string[];
}

export class FileNode implements FileSystemItem {
  constructor(
    readonly name: string,
    private readonly size: number
  ) {}

  getSize(): number {
    return this.size;
  }

  render(depth = 0): string[] {
    return [`${"  ".repeat(depth)}📄 ${this.name} (${this.size} KB)`];
  }
}

export class FolderNode implements FileSystemItem {
  private readonly children: FileSystemItem[] = [];

  constructor(readonly name: string) {}

  add(item: FileSystemItem): this {
    this.children.push(item);
    return this;
  }

  remove(item: FileSystemItem): void {
    const index = this.children.indexOf(item);
    if (index >= 0) this.children.splice(index, 1);
  }

  getSize(): number {
    return this.children.reduce((total, child) => total + child.getSize(), 0);
  }

  render(depth = 0): string[] {
    return [
      `${"  ".repeat(depth)}📁 ${this.name}/`,
      ...this.children.flatMap((child) => child.render(depth + 1)),
    ];
  }
}

export class CompositePatternDemo implements PatternDemo {
  readonly name = "Composite";
  readonly description = "Composes objects into tree structures to represent part-whole hierarchies.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("🌳 File System Composite Example");

    const documents = new FolderNode("Documents")
      .add(new FileNode("report.pdf", 100))
      .add(new FileNode("presentation.pptx", 200));
    const pictures = new FolderNode("Pictures")
      .add(new FileNode("photo1.jpg", 50))
      .add(new FileNode("photo2.png", 75));
    const root = new FolderNode("Root")
      .add(documents)
      .add(pictures)
      .add(new FileNode("readme.txt", 5));

    this.out.writeLine(`Total size: ${root.getSize()} KB`);
    for (const line of root.render()) {
      this.out.writeLine(line);
    }
  }
}
