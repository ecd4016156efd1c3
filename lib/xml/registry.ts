/**
 * Handler registry
 *
 * Holds the format handlers a classifier chooses from. A registry is an
 * explicit object handed to the analyzer, so tests can build isolated
 * registries with synthetic handlers.
 *
 * Registration happens once at startup. Building an analyzer seals the
 * registry; after that it is read-only and safe to share between concurrent
 * classifications.
 */

import { xmlDebug } from "./debug";
import {
  DuplicateHandlerError,
  InvalidHandlerError,
  RegistrySealedError,
} from "./errors";
import type { HandlerDescriptor } from "./types";

const dbg = xmlDebug("registry");

export type RegisteredHandler = HandlerDescriptor & {
  /** Position in registration order, the last tie-break */
  readonly registrationIndex: number;
};

export class HandlerRegistry {
  private readonly handlers: RegisteredHandler[] = [];
  private readonly byId = new Map<string, RegisteredHandler>();
  private isSealed = false;

  /**
   * Add a handler.
   *
   * @throws DuplicateHandlerError when the id is already registered
   * @throws RegistrySealedError once the registry is sealed
   */
  register(descriptor: HandlerDescriptor): this {
    if (!descriptor.id.trim()) {
      throw new InvalidHandlerError("Handler id must not be empty");
    }
    if (!Number.isInteger(descriptor.priority)) {
      throw new InvalidHandlerError(
        `Handler "${descriptor.id}" priority must be an integer, got ${descriptor.priority}`
      );
    }
    if (this.isSealed) {
      throw new RegistrySealedError(descriptor.id);
    }
    if (this.byId.has(descriptor.id)) {
      throw new DuplicateHandlerError(descriptor.id);
    }

    const registered: RegisteredHandler = {
      ...descriptor,
      registrationIndex: this.handlers.length,
    };
    this.handlers.push(registered);
    this.byId.set(registered.id, registered);
    dbg(
      "registered %s (priority %d, index %d)",
      registered.id,
      registered.priority,
      registered.registrationIndex
    );
    return this;
  }

  registerAll(descriptors: readonly HandlerDescriptor[]): this {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
    return this;
  }

  /**
   * Every handler in registration order.
   */
  all(): readonly RegisteredHandler[] {
    return this.handlers;
  }

  get(id: string): RegisteredHandler | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  get size(): number {
    return this.handlers.length;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  /**
   * Close the registry to further registration.
   */
  seal(): this {
    if (!this.isSealed) {
      this.isSealed = true;
      dbg("sealed with %d handlers", this.handlers.length);
    }
    return this;
  }
}

export function createRegistry(
  descriptors: readonly HandlerDescriptor[] = []
): HandlerRegistry {
  return new HandlerRegistry().registerAll(descriptors);
}
