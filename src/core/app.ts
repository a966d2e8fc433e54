import type { Plugin } from "./plugin";
import type { Logger } from "../domains/observability/types";
import { rootLogger } from "../domains/observability/logger";

export class Application {
  private plugins: Map<string, Plugin> = new Map();
  private started: Plugin[] = [];
  private readonly log: Logger;

  constructor(logger: Logger = rootLogger) {
    this.log = logger.child({ component: "Core" });
  }

  get pluginNames(): string[] {
    return Array.from(this.plugins.keys());
  }

  async use(plugin: Plugin) {
    if (this.plugins.has(plugin.name)) {
      throw new Error(`Plugin ${plugin.name} is already registered.`);
    }
    await plugin.setup(this);
    this.plugins.set(plugin.name, plugin);
    this.log.debug(`Plugin registered: ${plugin.name}`);
    return this;
  }

  async start() {
    this.log.info("Application starting...");
    for (const plugin of this.plugins.values()) {
      if (plugin.start) {
        await plugin.start();
      }
      this.started.push(plugin);
    }
    this.log.info("Application started.");
  }

  /**
   * Stops started plugins in reverse start order. Every plugin gets its
   * stop call even if an earlier one throws; the first error is rethrown.
   */
  async stop() {
    this.log.info("Application stopping...");
    let firstError: unknown;
    for (const plugin of [...this.started].reverse()) {
      if (!plugin.stop) continue;
      try {
        await plugin.stop();
      } catch (e) {
        this.log.error(`Plugin ${plugin.name} failed to stop`, e);
        firstError ??= e;
      }
    }
    this.started = [];
    this.log.info("Application stopped.");
    if (firstError !== undefined) throw firstError;
  }
}
