/**
 * Singleton: one instance per scope, created lazily
 *
 * Instead of a process-wide static, the single instances live in an explicit
 * InstanceScope whose lifetime the caller controls.
 */

import type { DemoOutput, PatternDemo } from "../../interfaces/IPatternDemo.js";

/**
 * Holds at most one instance per key, created on first request
 */
export class InstanceScope {
  private readonly instances = new Map<string, unknown>();

  getOrCreate<T>(key: string, factory: () => T, guard: (value: unknown) => value is T): T {
    const existing = this.instances.get(key);
    if (existing !== undefined) {
      if (!guard(existing)) {
        throw new TypeError(`Instance registered under "${key}" has an unexpected type`);
      }
      return existing;
    }
    const created = factory();
    this.instances.set(key, created);
    return created;
  }

  get size(): number {
    return this.instances.size;
  }
}

export class ConfigurationManager {
  private static readonly KEY = "configuration-manager";
  private readonly values = new Map<string, string>([
    ["AppName", "Design Patterns Demo"],
    ["Version", "1.0.0"],
    ["Environment", "Development"],
  ]);

  private constructor(out: DemoOutput) {
    out.writeLine("  🎯 ConfigurationManager instance created");
  }

  static instance(scope: InstanceScope, out: DemoOutput): ConfigurationManager {
    return scope.getOrCreate(
      ConfigurationManager.KEY,
      () => new ConfigurationManager(out),
      (value): value is ConfigurationManager => value instanceof ConfigurationManager
    );
  }

  get count(): number {
    return this.values.size;
  }

  setValue(key: string, value: string): void {
    this.values.set(key, value);
  }

  getValue(key: string, defaultValue = ""): string {
    return this.values.get(key) ?? defaultValue;
  }
}

export class AppLogger {
  private static readonly KEY = "app-logger";
  private readonly lines: string[] = [];

  private constructor(out: DemoOutput) {
    out.writeLine("  🎯 AppLogger instance created");
  }

  static instance(scope: InstanceScope, out: DemoOutput): AppLogger {
    return scope.getOrCreate(
      AppLogger.KEY,
      () => new AppLogger(out),
      (value): value is AppLogger => value instanceof AppLogger
    );
  }

  log(message: string): string {
    const line = `📝 [${this.lines.length + 1}] ${message}`;
    this.lines.push(line);
    return line;
  }
}

export class DatabaseConnection {
  private static readonly KEY = "database-connection";
  private connections = 1;

  private constructor(private readonly out: DemoOutput) {
    out.writeLine("  🎯 DatabaseConnection instance created");
  }

  static instance(scope: InstanceScope, out: DemoOutput): DatabaseConnection {
    return scope.getOrCreate(
      DatabaseConnection.KEY,
      () => new DatabaseConnection(out),
      (value): value is DatabaseConnection => value instanceof DatabaseConnection
    );
  }

  get connectionCount(): number {
    return this.connections;
  }

  executeQuery(query: string): void {
    this.out.writeLine(`  🗄️ Executing: ${query}`);
    this.connections++;
  }
}

/**
 * Key/value cache, created only when first requested
 */
export class AppCache {
  private static readonly KEY = "app-cache";
  private readonly entries = new Map<string, string>();

  private constructor(private readonly out: DemoOutput) {
    out.writeLine("  🎯 AppCache instance created (lazy initialization)");
  }

  static instance(scope: InstanceScope, out: DemoOutput): AppCache {
    return scope.getOrCreate(
      AppCache.KEY,
      () => new AppCache(out),
      (value): value is AppCache => value instanceof AppCache
    );
  }

  get count(): number {
    return this.entries.size;
  }

  set(key: string, value: string): void {
    this.entries.set(key, value);
    this.out.writeLine(`  💾 Cached: ${key} = ${value}`);
  }

  get(key: string): string | undefined {
    return this.entries.get(key);
  }
}

export class SingletonPatternDemo implements PatternDemo {
  readonly name = "Singleton";
  readonly description =
    "Ensures a class has only one instance and provides a single access point to it. " +
    "Useful for logging, configuration, database connections, caches and other resources " +
    "that should exist once for the lifetime of an application.";

  constructor(private readonly out: DemoOutput) {}

  demonstrate(): void {
    this.out.writeLine("Singleton Pattern Demonstration");
    this.out.writeLine();
    const scope = new InstanceScope();

    this.out.writeLine("🏛️ Lazy Logger:");
    const logger1 = AppLogger.instance(scope, this.out);
    const logger2 = AppLogger.instance(scope, this.out);
    this.out.writeLine(`  ${logger1.log("First message from logger1")}`);
    this.out.writeLine(`  ${logger2.log("Second message from logger2")}`);
    this.out.writeLine(`  Same instance? ${logger1 === logger2}`);
    this.out.writeLine();

    this.out.writeLine("🗄️ Shared Database Connection:");
    const database1 = DatabaseConnection.instance(scope, this.out);
    const database2 = DatabaseConnection.instance(scope, this.out);
    database1.executeQuery("SELECT * FROM Users");
    database2.executeQuery("UPDATE Users SET Status = 'Active'");
    this.out.writeLine(`  Same instance? ${database1 === database2}`);
    this.out.writeLine(`  Connection count: ${database1.connectionCount}`);
    this.out.writeLine();

    this.out.writeLine("⚡ Lazy Cache:");
    const cache1 = AppCache.instance(scope, this.out);
    const cache2 = AppCache.instance(scope, this.out);
    cache1.set("user:123", "John Doe");
    this.out.writeLine(`  Retrieved from cache: ${cache2.get("user:123") ?? "(missing)"}`);
    this.out.writeLine(`  Same instance? ${cache1 === cache2}`);
    this.out.writeLine(`  Cache size: ${cache1.count}`);
    this.out.writeLine();

    this.out.writeLine("⚙️ Practical Example - Configuration Manager:");
    const config = ConfigurationManager.instance(scope, this.out);
    config.setValue("DatabaseConnectionString", "Server=localhost;Database=MyApp;");
    config.setValue("ApiTimeout", "30");
    config.setValue("EnableLogging", "true");

    const another = ConfigurationManager.instance(scope, this.out);
    this.out.writeLine(`  Database Connection: ${another.getValue("DatabaseConnectionString")}`);
    this.out.writeLine(`  API Timeout: ${another.getValue("ApiTimeout")} seconds`);
    this.out.writeLine(`  Logging Enabled: ${another.getValue("EnableLogging")}`);
    this.out.writeLine(`  Total config items: ${config.count}`);
    this.out.writeLine(`  Instances in scope: ${scope.size}`);
  }
}
