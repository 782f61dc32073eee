/**
 * Builder: step-by-step database configuration
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

export interface DatabaseConfiguration {
  readonly connectionString: string;
  readonly timeoutSeconds: number;
  readonly loggingEnabled: boolean;
  readonly poolingEnabled: boolean;
  readonly poolSize: number;
  readonly retryEnabled: boolean;
  readonly maxRetries: number;
  readonly commandTimeoutSeconds: number;
}

export function describeConfiguration(config: DatabaseConfiguration): string[] {
  return [
    `  📡 Connection: ${config.connectionString}`,
    `  ⏱️ Timeout: ${config.timeoutSeconds}s`,
    `  📝 Logging: ${config.loggingEnabled ? "Enabled" : "Disabled"}`,
    `  🏊 Connection Pooling: ${config.poolingEnabled ? `Enabled (Size: ${config.poolSize})` : "Disabled"}`,
    `  🔄 Retry Logic: ${config.retryEnabled ? `Enabled (Max: ${config.maxRetries})` : "Disabled"}`,
    `  ⌛ Command Timeout: ${config.commandTimeoutSeconds}s`,
  ];
}

const DEFAULTS: DatabaseConfiguration = {
  connectionString: "",
  timeoutSeconds: 30,
  loggingEnabled: false,
  poolingEnabled: false,
  poolSize: 10,
  retryEnabled: false,
  maxRetries: 0,
  commandTimeoutSeconds: 30,
};

/**
 * Accumulates settings and produces an immutable configuration on build().
 * Offers both `setX` style methods and a fluent `forServer().withDatabase()` style.
 */
export class DatabaseConfigurationBuilder {
  private config: DatabaseConfiguration = { ...DEFAULTS };

  static createNew(): DatabaseConfigurationBuilder {
    return new DatabaseConfigurationBuilder();
  }

  setConnectionString(connectionString: string): this {
    this.config = { ...this.config, connectionString };
    return this;
  }

  setTimeout(seconds: number): this {
    this.config = { ...this.config, timeoutSeconds: seconds };
    return this;
  }

  enableLogging(): this {
    this.config = { ...this.config, loggingEnabled: true };
    return this;
  }

  enableConnectionPooling(): this {
    this.config = { ...this.config, poolingEnabled: true };
    return this;
  }

  /** Setting a pool size implies pooling */
  setPoolSize(size: number): this {
    this.config = { ...this.config, poolSize: size, poolingEnabled: true };
    return this;
  }

  enableRetryLogic(maxRetries: number): this {
    this.config = { ...this.config, retryEnabled: true, maxRetries };
    return this;
  }

  setCommandTimeout(seconds: number): this {
    this.config = { ...this.config, commandTimeoutSeconds: seconds };
    return this;
  }

  forServer(server: string): this {
    return this.setConnectionString(`Server=${server};`);
  }

  withDatabase(database: string): this {
    return this.setConnectionString(`${this.config.connectionString}Database=${database};`);
  }

  withEncryption(): this {
    return this.setConnectionString(`${this.config.connectionString}Encrypt=true;`);
  }

  withTimeout(seconds: number): this {
    return this.setTimeout(seconds);
  }

  withConnectionPooling(poolSize = 10): this {
    return this.setPoolSize(poolSize);
  }

  withRetryLogic(maxRetries: number): this {
    return this.enableRetryLogic(maxRetries);
  }

  withLogging(): this {
    return this.enableLogging();
  }

  build(): DatabaseConfiguration {
    return { ...this.config };
  }

  reset(): this {
    this.config = { ...DEFAULTS };
    return this;
  }
}

export class BuilderPatternDemo implements PatternDemo {
  readonly name = "Builder";
  readonly description =
    "Constructs complex objects step by step. " +
    "Useful when creating objects with many optional parameters " +
    "or when the construction process should allow different representations.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("🏗️ Database Configuration Builder Example");
    this.out.writeLine();

    this.print(
      "🔧 Development Database Configuration:",
      new DatabaseConfigurationBuilder()
        .setConnectionString("Server=localhost;Database=DevDB;")
        .setTimeout(30)
        .enableLogging()
        .setPoolSize(10)
        .build()
    );
    this.out.writeLine();

    this.print(
      "🚀 Production Database Configuration:",
      new DatabaseConfigurationBuilder()
        .setConnectionString("Server=prod-server;Database=ProdDB;Encrypt=true;")
        .setTimeout(60)
        .enableConnectionPooling()
        .setPoolSize(100)
        .enableRetryLogic(3)
        .setCommandTimeout(120)
        .build()
    );
    this.out.writeLine();

    this.print(
      "✨ Fluent Builder with Method Chaining:",
      DatabaseConfigurationBuilder.createNew()
        .forServer("fluent-server")
        .withDatabase("FluentDB")
        .withEncryption()
        .withTimeout(75)
        .withConnectionPooling(25)
        .withRetryLogic(2)
        .withLogging()
        .build()
    );
  }

  private print(title: string, config: DatabaseConfiguration): void {
    this.out.writeLine(title);
    for (const line of describeConfiguration(config)) {
      this.out.writeLine(line);
    }
  }
}
