import type { Logger } from "../domains/observability/types";
import type { Plugin } from "./plugin";
import type { ServiceMap, ServiceName } from "./services";

export class Application {
  private plugins: Map<string, Plugin> = new Map();
  private services: Partial<ServiceMap> = {};
  private started: Plugin[] = [];

  constructor(private readonly logger: Logger) {}

  registerService<K extends ServiceName>(name: K, service: ServiceMap[K]) {
    this.services[name] = service;
    return this;
  }

  getService<K extends ServiceName>(name: K): ServiceMap[K] {
    const service = this.services[name];
    if (!service) {
      throw new Error(`Service ${name} not found.`);
    }
    return service;
  }

  async use(plugin: Plugin) {
    if (this.plugins.has(plugin.name)) {
      throw new Error(`Plugin ${plugin.name} is already registered.`);
    }
    await plugin.setup(this);
    this.plugins.set(plugin.name, plugin);
    this.logger.debug("Plugin registered", { plugin: plugin.name });
    return this;
  }

  async start() {
    this.logger.info("Application starting...");
    for (const plugin of this.plugins.values()) {
      // recorded first so stop() also cleans up after a failed start
      this.started.push(plugin);
      if (plugin.start) {
        await plugin.start();
      }
    }
    this.logger.info("Application started");
  }

  /** Stops started plugins in reverse order; safe to call more than once. */
  async stop() {
    this.logger.info("Application stopping...");
    while (this.started.length > 0) {
      const plugin = this.started.pop();
      if (!plugin?.stop) continue;
      try {
        await plugin.stop();
      } catch (e) {
        this.logger.error(`Plugin ${plugin.name} failed to stop`, e);
      }
    }
    this.logger.info("Application stopped");
  }
}
