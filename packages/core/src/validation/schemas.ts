/**
 * Zod schemas for validating accessor inputs
 */

import { z } from 'zod';

/** Field kind enum */
export const fieldKindSchema = z.enum([
  'string',
  'number',
  'integer',
  'boolean',
  'date',
  'array',
  'object',
  'unknown',
]);

/** A single field name */
export const fieldNameSchema = z.string().min(1);

/** Field definition as declared on a record type */
export const fieldDefinitionSchema = z
  .object({
    name: fieldNameSchema,
    kind: fieldKindSchema,
    nullable: z.boolean(),
    readable: z.boolean(),
    writable: z.boolean(),
    description: z.string().optional(),
  })
  .refine((field) => field.readable || field.writable, {
    message: 'A field must be readable, writable, or both',
  });

/** Record type definition header */
export const recordTypeDefinitionSchema = z
  .object({
    name: z.string().min(1),
    fields: z.array(fieldDefinitionSchema),
  })
  .superRefine((value, ctx) => {
    const names = new Set<string>();
    value.fields.forEach((field, i) => {
      if (names.has(field.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate field name: ${field.name}`,
          path: ['fields', i, 'name'],
        });
      }
      names.add(field.name);
    });
  });

/** Export types from schemas */
export type FieldKindInput = z.infer<typeof fieldKindSchema>;
export type FieldDefinitionInput = z.infer<typeof fieldDefinitionSchema>;
export type RecordTypeDefinitionInput = z.infer<typeof recordTypeDefinitionSchema>;

/**
 * Flatten zod issues into one line per issue
 */
export function formatZodError(err: z.ZodError, subject = 'input'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid ${subject}:\n${issues}`;
}
