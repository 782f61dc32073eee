/**
 * Memento: text editor snapshots with undo
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

export interface EditorMemento {
  readonly content: string;
  readonly savedAt: Date;
}

export class TextEditor {
  private text = "";

  get content(): string {
    return this.text;
  }

  write(text: string): void {
    this.text += text;
  }

  save(): EditorMemento {
    return Object.freeze({ content: this.text, savedAt: new Date() });
  }

  restore(memento: EditorMemento): void {
    this.text = memento.content;
  }
}

export class EditorHistory {
  private readonly snapshots: EditorMemento[] = [];

  save(editor: TextEditor): void {
    this.snapshots.push(editor.save());
  }

  /** Restores the latest snapshot; false when history is empty */
  undo(editor: TextEditor): boolean {
    const memento = this.snapshots.pop();
    if (!memento) return false;
    editor.restore(memento);
    return true;
  }
}

export class MementoPatternDemo implements PatternDemo {
  readonly name = "Memento";
  readonly description = "Captures and restores an object's internal state without violating encapsulation.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("💾 Text Editor Memento Example");
    const editor = new TextEditor();
    const history = new EditorHistory();

    editor.write("Hello");
    history.save(editor);
    this.current(editor);

    editor.write(" World");
    history.save(editor);
    this.current(editor);

    editor.write("!!!");
    this.current(editor);

    for (let i = 0; i < 3; i++) {
      this.out.writeLine();
      this.out.writeLine("⏪ Undoing last change:");
      if (history.undo(editor)) {
        this.current(editor);
      } else {
        this.out.writeLine("❌ No more states to restore");
      }
    }
  }

  private current(editor: TextEditor): void {
    this.out.writeLine(`📝 Current: '${editor.content}'`);
  }
}
