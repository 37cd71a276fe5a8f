/**
 * Build dialects from YAML definition files.
 */
import { globFiles, loadYamlWithSchema } from '../../utils/index.js';
import { DialectError, SystemError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { logger as log } from '../../utils/logger.js';
import { buildGrammar } from '../grammar/describe.js';
import { Dialect } from './dialect.js';
import { dialectRegistry, type DialectRegistry } from './registry.js';
import { DialectDefinitionSchema, type DialectDefinition } from './schema.js';
import { defineSegment } from './segment.js';

/**
 * Validate an untrusted value as a dialect definition.
 */
export function parseDialectDefinition(value: unknown): DialectDefinition {
  const result = DialectDefinitionSchema.safeParse(value);
  if (!result.success) {
    throw new SystemError(
      ErrorCodes.INVALID_DEFINITION,
      `Invalid dialect definition: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return result.data;
}

/**
 * Load and validate one dialect definition file.
 */
export async function loadDialectDefinition(filePath: string): Promise<DialectDefinition> {
  return loadYamlWithSchema(filePath, DialectDefinitionSchema);
}

/**
 * Apply a definition and return the resulting unpublished dialect.
 *
 * Edits run in a fixed order: keyword removals, keyword additions, promotions,
 * new fragments, replaced fragments, then segments in file order.
 */
export function buildDialectFromDefinition(
  definition: DialectDefinition,
  registry: DialectRegistry = dialectRegistry
): Dialect {
  const dialect = definition.derive_from
    ? registry.load(definition.derive_from).copyAs(definition.name)
    : new Dialect(definition.name, { exclusiveKeywordGroups: definition.exclusive_keyword_groups });

  for (const [setName, edit] of Object.entries(definition.keywords)) {
    if (edit.remove.length > 0) dialect.keywords(setName).differenceUpdate(edit.remove);
  }
  for (const [setName, edit] of Object.entries(definition.keywords)) {
    if (edit.add.length > 0) dialect.keywords(setName).update(edit.add);
  }
  for (const promotion of definition.promote) {
    dialect.promoteKeywords(promotion.from, promotion.to, promotion.keywords);
  }

  const added = Object.entries(definition.add);
  if (added.length > 0) {
    dialect.add(Object.fromEntries(added.map(([name, grammar]) => [name, buildGrammar(grammar)])));
  }
  const replaced = Object.entries(definition.replace);
  if (replaced.length > 0) {
    dialect.add(
      Object.fromEntries(replaced.map(([name, grammar]) => [name, buildGrammar(grammar)])),
      { replace: true }
    );
  }

  for (const segment of definition.segments) {
    dialect.register(
      defineSegment({
        name: segment.name,
        type: segment.type,
        grammar: buildGrammar(segment.grammar),
        description: segment.description,
      }),
      { replace: segment.replace }
    );
  }

  return dialect;
}

/**
 * Build and publish the dialect a definition describes.
 */
export function applyDialectDefinition(
  definition: DialectDefinition,
  registry: DialectRegistry = dialectRegistry
): Dialect {
  return buildDialectFromDefinition(definition, registry).publish();
}

/**
 * Register a definition as a lazily built dialect.
 */
export function registerDialectDefinition(
  definition: DialectDefinition,
  registry: DialectRegistry = dialectRegistry
): void {
  if (definition.derive_from === definition.name) {
    throw new DialectError(
      ErrorCodes.CIRCULAR_DERIVATION,
      `Dialect '${definition.name}' is derived from itself`,
      { dialect: definition.name }
    );
  }
  registry.register(definition.name, (owner) => buildDialectFromDefinition(definition, owner));
}

/**
 * Find definition files by glob, load them and register each dialect.
 * Returns the registered dialect names.
 */
export async function registerDefinitionFiles(
  patterns: string[],
  cwd: string,
  registry: DialectRegistry = dialectRegistry
): Promise<string[]> {
  if (patterns.length === 0) return [];
  const files = await globFiles(patterns, { cwd });
  const names: string[] = [];
  for (const file of files) {
    const definition = await loadDialectDefinition(file);
    registerDialectDefinition(definition, registry);
    log.debug(`Registered from ${file}`, { dialect: definition.name });
    names.push(definition.name);
  }
  return names;
}
