/**
 * Registry of procedure handlers. Maps procedure name to the handler serving it.
 * Owned by a Router instance; there is no process-wide registry.
 */

import type { Handler } from "./envelope.js";

export class Registry {
  private readonly routes = new Map<string, Handler>();

  /**
   * Bind a handler to a procedure name. Any previous binding is replaced.
   * Names are matched exactly; the empty string is a valid name.
   */
  register(procedure: string, handler: Handler): void {
    this.routes.set(procedure, handler);
  }

  lookup(procedure: string): Handler | undefined {
    return this.routes.get(procedure);
  }

  has(procedure: string): boolean {
    return this.routes.has(procedure);
  }

  /** Registered names, in first-registration order. */
  procedures(): string[] {
    return [...this.routes.keys()];
  }

  get size(): number {
    return this.routes.size;
  }
}
