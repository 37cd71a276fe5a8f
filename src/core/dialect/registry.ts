/**
 * Registry of named dialects.
 * Factories are registered up front and built lazily on first load; built dialects are
 * published and cached, so every caller shares one immutable instance.
 */
import { DialectError, ErrorCodes } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import type { Dialect } from './dialect.js';

/**
 * Builds a dialect. Derived dialects load their base through the registry they receive.
 */
export type DialectFactory = (registry: DialectRegistry) => Dialect;

interface DialectRegistration {
  factory: DialectFactory;
  instance?: Dialect;
  building: boolean;
}

export class DialectRegistry {
  private registrations = new Map<string, DialectRegistration>();

  /**
   * Register a dialect factory. Re-registering a name requires `replace`.
   */
  register(name: string, factory: DialectFactory, options: { replace?: boolean } = {}): void {
    if (this.registrations.has(name) && !options.replace) {
      throw new DialectError(
        ErrorCodes.DUPLICATE_DEFINITION,
        `Dialect '${name}' is already registered`,
        { dialect: name }
      );
    }
    this.registrations.set(name, { factory, building: false });
  }

  has(name: string): boolean {
    return this.registrations.has(name);
  }

  names(): string[] {
    return Array.from(this.registrations.keys());
  }

  /**
   * Build (once), publish and return the named dialect.
   */
  load(name: string): Dialect {
    const registration = this.registrations.get(name);
    if (!registration) {
      throw new DialectError(
        ErrorCodes.UNKNOWN_DIALECT,
        `Dialect '${name}' is not registered`,
        { dialect: name, available: this.names() }
      );
    }

    if (registration.instance) {
      return registration.instance;
    }

    if (registration.building) {
      throw new DialectError(
        ErrorCodes.CIRCULAR_DERIVATION,
        `Dialect '${name}' is derived from itself`,
        { dialect: name }
      );
    }

    registration.building = true;
    try {
      const dialect = registration.factory(this);
      if (dialect.name !== name) {
        throw new DialectError(
          ErrorCodes.UNKNOWN_DIALECT,
          `Factory registered as '${name}' built dialect '${dialect.name}'`,
          { dialect: name, built: dialect.name }
        );
      }
      registration.instance = dialect.publish();
      log.debug('Loaded', { dialect: name });
      return registration.instance;
    } finally {
      registration.building = false;
    }
  }

  /**
   * Clear all registrations.
   * Mainly for testing.
   */
  clear(): void {
    this.registrations.clear();
  }
}

/**
 * Global dialect registry instance.
 */
export const dialectRegistry = new DialectRegistry();
