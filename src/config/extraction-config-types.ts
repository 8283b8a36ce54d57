import { z } from 'zod';

import { JsonValueSchema } from '../kernel/schemas-document.js';
import { DEFAULT_ENTRY_POINT_PATTERN } from '../source/entry-points.js';

export const CONTAINER_KINDS = ['QuestLine', 'TemporaryBattle', 'GymPokemon'] as const;

const isValidPattern = (pattern: string): boolean => {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
};

const NameListSchema = z.array(z.string().min(1));

export const VariantNamesSchema = z
  .object({
    typed: NameListSchema.default([]),
    generic: NameListSchema.default([]),
  })
  .strict();

export const ComparisonTableSchema = z
  .object({
    less: z.number().int(),
    equal: z.number().int(),
    more: z.number().int(),
  })
  .strict();

export const ExtractionConfigSchema = z
  .object({
    version: z.literal(1),
    domain: z.string().min(1),
    source: z.string().min(1),
    companion: z.string().min(1).optional(),
    output: z.string().min(1),
    entryPoints: z
      .object({
        pattern: z.string().refine(isValidPattern, 'must be a valid regular expression').default(DEFAULT_ENTRY_POINT_PATTERN),
      })
      .strict()
      .default({ pattern: DEFAULT_ENTRY_POINT_PATTERN }),
    nameBindings: z
      .object({
        constructors: NameListSchema.default([]),
      })
      .strict()
      .default({ constructors: [] }),
    variants: z
      .object({
        requirements: VariantNamesSchema,
        quests: VariantNamesSchema,
        suffixes: z
          .object({
            requirement: z.string().min(1).default('Requirement'),
            quest: z.string().min(1).default('Quest'),
          })
          .strict()
          .default({ requirement: 'Requirement', quest: 'Quest' }),
      })
      .strict(),
    containers: z.array(z.enum(CONTAINER_KINDS)).min(1),
    tables: z
      .object({
        region: NameListSchema.default([]),
        starter: NameListSchema.default([]),
        bulletinBoard: NameListSchema.default([]),
        comparison: ComparisonTableSchema.default({ less: 0, equal: 1, more: 2 }),
      })
      .strict()
      .default({ region: [], starter: [], bulletinBoard: [], comparison: { less: 0, equal: 1, more: 2 } }),
    globals: z.record(z.string(), JsonValueSchema).default({}),
    placeholder: JsonValueSchema.default('mock'),
  })
  .strict();

export type ExtractionConfigInput = z.input<typeof ExtractionConfigSchema>;
export type ExtractionConfigDocument = z.output<typeof ExtractionConfigSchema>;

/** Validated configuration with every path made absolute. */
export interface ExtractionConfig extends ExtractionConfigDocument {
  readonly configPath?: string;
}
