import { z } from 'zod';

export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.null(), z.boolean(), z.number(), z.string(), z.array(JsonValueSchema), z.record(z.string(), JsonValueSchema)]),
);

export const RequirementDocSchema = z
  .object({
    type: z.string(),
    comparisonMode: z.union([z.literal('less'), z.literal('equal')]).optional(),
  })
  .catchall(JsonValueSchema);

export const ContainerDocSchema = z
  .object({
    name: z.string(),
    description: JsonValueSchema,
    unlockRequirement: RequirementDocSchema.nullable(),
    flags: z.record(z.string(), JsonValueSchema),
    children: z.array(JsonValueSchema),
  })
  .strict();

export const ExtractionDocumentSchema = z.array(ContainerDocSchema);

export interface ContainerDocument {
  readonly name: string;
  readonly description: JsonValue;
  readonly unlockRequirement: JsonObject | null;
  readonly flags: JsonObject;
  readonly children: JsonValue[];
}

export type ExtractionDocument = ContainerDocument[];

/** JSON Schema (draft-07) of the output document, for consumers outside this package. */
export const buildDocumentJsonSchema = (): Record<string, unknown> => ({
  ...z.toJSONSchema(ExtractionDocumentSchema, { target: 'draft-7' }),
  $id: 'ExtractionDocument.schema.json',
});
