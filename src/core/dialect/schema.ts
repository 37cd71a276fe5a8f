/**
 * Schema for dialect definition files.
 */
import { z } from 'zod';
import { GrammarDescriptionSchema } from '../grammar/schema.js';

/** Additions and removals for one keyword set. Removals are applied first. */
export const KeywordEditSchema = z.object({
  add: z.array(z.string()).default([]),
  remove: z.array(z.string()).default([]),
});

export const KeywordPromotionSchema = z.object({
  from: z.string(),
  to: z.string(),
  keywords: z.array(z.string()),
});

export const SegmentDescriptionSchema = z.object({
  name: z.string(),
  type: z.string(),
  grammar: GrammarDescriptionSchema,
  description: z.string().optional(),
  /** Replace an inherited segment wholesale. */
  replace: z.boolean().default(false),
});

export const DialectDefinitionSchema = z
  .object({
    name: z.string().min(1),
    /** Registered dialect to copy before applying the edits below. */
    derive_from: z.string().optional(),
    description: z.string().optional(),
    /** Only for base dialects; derived dialects inherit the groups of their base. */
    exclusive_keyword_groups: z.array(z.array(z.string())).optional(),
    keywords: z.record(z.string(), KeywordEditSchema).default({}),
    promote: z.array(KeywordPromotionSchema).default([]),
    /** New named fragments. */
    add: z.record(z.string(), GrammarDescriptionSchema).default({}),
    /** Existing fragments redefined wholesale. */
    replace: z.record(z.string(), GrammarDescriptionSchema).default({}),
    segments: z.array(SegmentDescriptionSchema).default([]),
  })
  .refine((definition) => !(definition.derive_from && definition.exclusive_keyword_groups), {
    message: 'cannot be set together with derive_from',
    path: ['exclusive_keyword_groups'],
  });

export type KeywordEdit = z.infer<typeof KeywordEditSchema>;
export type KeywordPromotion = z.infer<typeof KeywordPromotionSchema>;
export type SegmentDescription = z.infer<typeof SegmentDescriptionSchema>;
export type DialectDefinition = z.infer<typeof DialectDefinitionSchema>;
/** Definition as written, before schema defaults are applied. */
export type DialectDefinitionInput = z.input<typeof DialectDefinitionSchema>;
