/**
 * Flyweight: thousands of trees sharing a handful of tree types
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

/** Intrinsic, shared state */
export class TreeType {
  constructor(
    readonly name: string,
    readonly color: string,
    readonly texture: string
  ) {}

  render(x: number, y: number): string {
    return `🌳 Rendering ${this.color} ${this.name} at (${x}, ${y})`;
  }
}

export class TreeTypeFactory {
  private readonly types = new Map<string, TreeType>();

  get createdTypes(): number {
    return this.types.size;
  }

  getTreeType(name: string, color: string, texture: string): TreeType {
    const key = `${name}-${color}-${texture}`;
    let type = this.types.get(key);
    if (!type) {
      type = new TreeType(name, color, texture);
      this.types.set(key, type);
    }
    return type;
  }
}

/** Extrinsic state (position) plus a reference to the shared type */
export interface Tree {
  readonly x: number;
  readonly y: number;
  readonly type: TreeType;
}

export class Forest {
  private readonly trees: Tree[] = [];

  constructor(private readonly factory: TreeTypeFactory = new TreeTypeFactory()) {}

  get treeCount(): number {
    return this.trees.length;
  }

  get typeCount(): number {
    return this.factory.createdTypes;
  }

  plantTree(x: number, y: number, name: string, color: string, texture: string): Tree {
    const tree: Tree = { x, y, type: this.factory.getTreeType(name, color, texture) };
    this.trees.push(tree);
    return tree;
  }

  paint(limit: number): string[] {
    const lines = this.trees.slice(0, limit).map((tree) => tree.type.render(tree.x, tree.y));
    if (this.trees.length > limit) {
      lines.push(`... and ${this.trees.length - limit} more trees`);
    }
    return lines;
  }
}

const SPECIES = [
  ["Oak", "Green", "oak.png"],
  ["Pine", "Dark Green", "pine.png"],
  ["Birch", "White", "birch.png"],
] as const;

export class FlyweightPatternDemo implements PatternDemo {
  readonly name = "Flyweight";
  readonly description = "Uses sharing to efficiently support large numbers of similar objects.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("🏞️ Tree Forest Flyweight Example");
    const forest = new Forest();

    for (let i = 0; i < 1000; i++) {
      const [name, color, texture] = SPECIES[i % SPECIES.length] ?? SPECIES[0];
      forest.plantTree((i * 37) % 100, (i * 61) % 100, name, color, texture);
    }

    this.out.writeLine("🎨 Painting forest (showing first 5 trees):");
    for (const line of forest.paint(5)) {
      this.out.writeLine(line);
    }
    this.out.writeLine(`🌳 Created ${forest.treeCount} trees`);
    this.out.writeLine(`🎯 TreeType flyweights created: ${forest.typeCount}`);
  }
}
