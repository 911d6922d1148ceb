import { z } from 'zod';
import { MalformedInputError } from '../errors.js';
import type { CompanyRecord } from '../types.js';

const text = (max: number) =>
  z
    .union([z.string().max(max), z.number()])
    .nullish()
    .transform((v) => {
      if (v === null || v === undefined) return undefined;
      const s = String(v).trim();
      return s ? s : undefined;
    });

const AddressSchema = z
  .object({
    state: text(128),
    country: text(128),
    postalCode: text(32),
  })
  .nullish()
  .transform((a) => a ?? {});

const EnrichmentSchema = z
  .object({
    companyName: text(512),
    website: text(2048),
    address: AddressSchema,
  })
  .nullish()
  .transform((e) => e ?? { address: {} });

/**
 * Wire shape of a record as accepted by the API and the CLI. Blank and
 * null values collapse to undefined; postal codes may arrive as numbers.
 */
export const CompanyRecordSchema: z.ZodType<CompanyRecord, z.ZodTypeDef, unknown> = z.object({
  id: z.union([z.string(), z.number()]).transform((v) => String(v).trim()).pipe(z.string().min(1).max(64)),
  name: text(512),
  website: text(2048),
  email: text(320),
  billing: AddressSchema,
  enrichment: EnrichmentSchema,
  parentId: text(64),
  parentName: text(512),
});

/** @throws MalformedInputError listing every invalid field. */
export function parseRecord(input: unknown): CompanyRecord {
  const parsed = CompanyRecordSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'record'}: ${i.message}`).join('; ');
    throw new MalformedInputError(`Invalid record: ${detail}`, { cause: parsed.error });
  }
  return parsed.data;
}
