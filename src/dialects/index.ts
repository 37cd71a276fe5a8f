/**
 * Built-in dialects.
 */
import { dialectRegistry, type DialectRegistry } from '../core/dialect/registry.js';
import type { Dialect } from '../core/dialect/dialect.js';
import { ANSI_DIALECT, buildAnsiDialect } from './ansi.js';
import { TSQL_DIALECT, buildTsqlDialect } from './tsql.js';

export { ANSI_DIALECT, buildAnsiDialect, keywordResource } from './ansi.js';
export { TSQL_DIALECT, buildTsqlDialect } from './tsql.js';

/**
 * Register the built-in dialects that are not registered yet.
 */
export function registerBuiltinDialects(registry: DialectRegistry = dialectRegistry): void {
  if (!registry.has(ANSI_DIALECT)) {
    registry.register(ANSI_DIALECT, () => buildAnsiDialect());
  }
  if (!registry.has(TSQL_DIALECT)) {
    registry.register(TSQL_DIALECT, (owner) => buildTsqlDialect(owner.load(ANSI_DIALECT)));
  }
}

/**
 * Load a published dialect by name, built-ins included.
 */
export function loadDialect(name: string, registry: DialectRegistry = dialectRegistry): Dialect {
  registerBuiltinDialects(registry);
  return registry.load(name);
}
