// =============================================================================
// InMemoryConfigStore — Map-backed ConfigStorePort
// =============================================================================

import type { ConfigStorePort } from "../../ports/config-store.port.js";

export class InMemoryConfigStore implements ConfigStorePort {
  private readonly values = new Map<string, unknown>();

  constructor(initial: Record<string, unknown> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  get(key: string, defaultValue?: unknown): unknown {
    return this.values.has(key) ? this.values.get(key) : defaultValue;
  }

  set(key: string, value: unknown): void {
    this.values.set(key, value);
  }

  delete(key: string): boolean {
    return this.values.delete(key);
  }

  toJSON(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }
}
