/**
 * Abstract Factory: cross-platform UI component families
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

export interface Button {
  render(): string;
  click(): string;
}

export interface TextBox {
  render(): string;
  setText(text: string): string;
}

export interface AppWindow {
  render(): string;
  minimize(): string;
}

/**
 * Produces one consistent family of widgets
 */
export interface UIThemeFactory {
  readonly themeName: string;
  createButton(): Button;
  createTextBox(): TextBox;
  createWindow(): AppWindow;
}

export class WindowsThemeFactory implements UIThemeFactory {
  readonly themeName = "Windows";

  createButton(): Button {
    return {
      render: () => "🔲 Rendered Windows-style button with blue theme",
      click: () => "Windows button clicked with system sound",
    };
  }

  createTextBox(): TextBox {
    return {
      render: () => "📝 Rendered Windows-style text box with Segoe UI font",
      setText: (text) => `Text set: ${text}`,
    };
  }

  createWindow(): AppWindow {
    return {
      render: () => "🪟 Rendered Windows-style window with title bar and system controls",
      minimize: () => "Window minimized to taskbar",
    };
  }
}

export class MacThemeFactory implements UIThemeFactory {
  readonly themeName = "macOS";

  createButton(): Button {
    return {
      render: () => "🔘 Rendered macOS-style button with rounded corners and subtle shadow",
      click: () => "macOS button clicked with haptic feedback",
    };
  }

  createTextBox(): TextBox {
    return {
      render: () => "📝 Rendered macOS-style text box with San Francisco font",
      setText: (text) => `Text set with smooth cursor animation: ${text}`,
    };
  }

  createWindow(): AppWindow {
    return {
      render: () => "🍎 Rendered macOS-style window with traffic light controls",
      minimize: () => "Window minimized with genie effect to dock",
    };
  }
}

export class LinuxThemeFactory implements UIThemeFactory {
  readonly themeName = "Linux";

  createButton(): Button {
    return {
      render: () => "🐧 Rendered Linux-style button with GTK theme",
      click: () => "Linux button clicked with customizable action",
    };
  }

  createTextBox(): TextBox {
    return {
      render: () => "📝 Rendered Linux-style text box with Liberation Sans font",
      setText: (text) => `Text set with vim-style navigation: ${text}`,
    };
  }

  createWindow(): AppWindow {
    return {
      render: () => "🪟 Rendered Linux-style window with customizable window manager",
      minimize: () => "Window minimized to workspace switcher",
    };
  }
}

export class AbstractFactoryPatternDemo implements PatternDemo {
  readonly name = "Abstract Factory";
  readonly description =
    "Creates families of related objects without specifying their concrete classes. " +
    "Useful when products from the same family must be used together " +
    "and the system should not depend on how its products are created.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("🎨 Cross-Platform UI Component Factory Example");
    const factories: UIThemeFactory[] = [
      new WindowsThemeFactory(),
      new MacThemeFactory(),
      new LinuxThemeFactory(),
    ];

    for (const factory of factories) {
      this.out.writeLine();
      this.renderTheme(factory);
    }
  }

  private renderTheme(factory: UIThemeFactory): void {
    this.out.writeLine(`🖥️ Creating ${factory.themeName} UI Components:`);

    const button = factory.createButton();
    const textBox = factory.createTextBox();
    const window = factory.createWindow();

    this.out.writeLine(`  ${button.render()}`);
    this.out.writeLine(`  ${textBox.render()}`);
    this.out.writeLine(`  ${window.render()}`);
    this.out.writeLine(`  ${textBox.setText("Hello")}`);
    this.out.writeLine(`  ${button.click()}`);
    this.out.writeLine(`✨ All components have consistent ${factory.themeName} styling!`);
  }
}
