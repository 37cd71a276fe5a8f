/**
 * Structural descriptions of grammar trees, as written in YAML or JSON.
 */
import { z } from 'zod';
import { TOKEN_KINDS } from './types.js';

interface DescriptionBase {
  optional?: boolean;
}

interface CompositeDescriptionBase extends DescriptionBase {
  children: GrammarDescription[];
  exclude?: GrammarDescription;
}

export interface KeywordDescription extends DescriptionBase {
  type: 'keyword';
  value: string;
  segmentType?: string;
}

export interface SymbolDescription extends DescriptionBase {
  type: 'symbol';
  value: string;
  name?: string;
  segmentType?: string;
}

export interface PatternDescription extends DescriptionBase {
  type: 'pattern';
  source: string;
  flags?: string;
  name: string;
  segmentType?: string;
  antiKeywordSet?: string;
  trimChars?: string[];
}

export interface NamedTokenDescription extends DescriptionBase {
  type: 'namedToken';
  tokenKind: (typeof TOKEN_KINDS)[number];
  name?: string;
  segmentType?: string;
  trimChars?: string[];
}

export interface RefDescription extends DescriptionBase {
  type: 'ref';
  name: string;
  exclude?: GrammarDescription;
}

export interface SequenceDescription extends CompositeDescriptionBase {
  type: 'sequence';
  wrapper?: string;
}

export interface OneOfDescription extends CompositeDescriptionBase {
  type: 'oneOf';
}

export interface AnyNumberOfDescription extends CompositeDescriptionBase {
  type: 'anyNumberOf';
  min?: number;
  max?: number | null;
}

export interface BracketedDescription extends CompositeDescriptionBase {
  type: 'bracketed';
  bracketPair?: 'round' | 'square' | 'curly';
  bracketOptional?: boolean;
}

export interface DelimitedDescription extends CompositeDescriptionBase {
  type: 'delimited';
  delimiter?: GrammarDescription;
  allowTrailing?: boolean;
  minDelimiters?: number;
}

export type GrammarNodeDescription =
  | KeywordDescription
  | SymbolDescription
  | PatternDescription
  | NamedTokenDescription
  | RefDescription
  | SequenceDescription
  | OneOfDescription
  | AnyNumberOfDescription
  | BracketedDescription
  | DelimitedDescription;

/** A bare string is shorthand for a required keyword. */
export type GrammarDescription = string | GrammarNodeDescription;

const base = {
  optional: z.boolean().optional(),
};

const children = () => z.array(GrammarDescriptionSchema);

const GrammarNodeDescriptionSchema: z.ZodType<GrammarNodeDescription> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({
      ...base,
      type: z.literal('keyword'),
      value: z.string(),
      segmentType: z.string().optional(),
    }),
    z.object({
      ...base,
      type: z.literal('symbol'),
      value: z.string(),
      name: z.string().optional(),
      segmentType: z.string().optional(),
    }),
    z.object({
      ...base,
      type: z.literal('pattern'),
      source: z.string(),
      flags: z.string().optional(),
      name: z.string(),
      segmentType: z.string().optional(),
      antiKeywordSet: z.string().optional(),
      trimChars: z.array(z.string()).optional(),
    }),
    z.object({
      ...base,
      type: z.literal('namedToken'),
      tokenKind: z.enum(TOKEN_KINDS),
      name: z.string().optional(),
      segmentType: z.string().optional(),
      trimChars: z.array(z.string()).optional(),
    }),
    z.object({
      ...base,
      type: z.literal('ref'),
      name: z.string(),
      exclude: GrammarDescriptionSchema.optional(),
    }),
    z.object({
      ...base,
      type: z.literal('sequence'),
      children: children(),
      exclude: GrammarDescriptionSchema.optional(),
      wrapper: z.string().optional(),
    }),
    z.object({
      ...base,
      type: z.literal('oneOf'),
      children: children(),
      exclude: GrammarDescriptionSchema.optional(),
    }),
    z.object({
      ...base,
      type: z.literal('anyNumberOf'),
      children: children(),
      exclude: GrammarDescriptionSchema.optional(),
      min: z.number().int().optional(),
      max: z.number().int().nullable().optional(),
    }),
    z.object({
      ...base,
      type: z.literal('bracketed'),
      children: children(),
      exclude: GrammarDescriptionSchema.optional(),
      bracketPair: z.enum(['round', 'square', 'curly']).optional(),
      bracketOptional: z.boolean().optional(),
    }),
    z.object({
      ...base,
      type: z.literal('delimited'),
      children: children(),
      exclude: GrammarDescriptionSchema.optional(),
      delimiter: GrammarDescriptionSchema.optional(),
      allowTrailing: z.boolean().optional(),
      minDelimiters: z.number().int().optional(),
    }),
  ])
);

export const GrammarDescriptionSchema: z.ZodType<GrammarDescription> = z.lazy(() =>
  z.union([z.string(), GrammarNodeDescriptionSchema])
);
