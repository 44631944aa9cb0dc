/**
 * In-memory service registry consulted by `@name` expression references
 */

import type { ServiceRegistry } from "../../types/shortcut.js";
import { ConfigurationError } from "../../utils/errors.js";

export class InMemoryServiceRegistry implements ServiceRegistry {
  private services = new Map<string, unknown>();

  constructor(initial: Record<string, unknown> = {}) {
    for (const [name, service] of Object.entries(initial)) {
      this.register(name, service);
    }
  }

  register(name: string, service: unknown): this {
    if (name.trim() === "") {
      throw new ConfigurationError("Service name must not be empty");
    }
    if (this.services.has(name)) {
      throw new ConfigurationError(`Service already registered: ${name}`, {
        name,
      });
    }
    this.services.set(name, service);
    return this;
  }

  has(name: string): boolean {
    return this.services.has(name);
  }

  get(name: string): unknown {
    return this.services.get(name);
  }

  names(): string[] {
    return Array.from(this.services.keys());
  }
}

export const EMPTY_REGISTRY: ServiceRegistry = {
  has: () => false,
  get: () => undefined,
};
