/**
 * Zod schemas for validating engine and history configuration
 */

import { z } from 'zod';

/** Valid SQL identifier (alphanumeric + underscore, starting with a letter or underscore) */
export const SQL_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

const attributeNameSchema = z
  .string()
  .min(1)
  .refine((value) => value.trim().length > 0, { message: 'Attribute name must not be blank' });

export const identifierSchema = z
  .string()
  .regex(SQL_IDENTIFIER, 'Must be a SQL identifier (letters, digits, underscore)');

/** Single column or composite business key */
export const businessKeySchema = z.union([
  attributeNameSchema,
  z.array(attributeNameSchema).min(1),
]);

export const hashAlgorithmSchema = z.enum(['sha256', 'sha512']);

/** Audit column names of a history table */
export const historyColumnsSchema = z
  .object({
    rowHash: identifierSchema,
    validFrom: identifierSchema,
    validTo: identifierSchema,
    isCurrent: identifierSchema,
  })
  .partial()
  .strict();

function findDuplicates(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) duplicates.add(value);
    seen.add(value);
  }
  return [...duplicates];
}

/** Business key, monitored attributes and change-detection switches */
export const engineConfigSchema = z
  .object({
    businessKey: businessKeySchema,
    monitoredAttributes: z.array(attributeNameSchema).min(1),
    detectRemoved: z.boolean().default(false),
    hashAlgorithm: hashAlgorithmSchema.default('sha256'),
  })
  .strict()
  .superRefine((value, ctx) => {
    const keyFields = Array.isArray(value.businessKey) ? value.businessKey : [value.businessKey];

    for (const duplicate of findDuplicates(keyFields)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate business key column: ${duplicate}`,
        path: ['businessKey'],
      });
    }

    for (const duplicate of findDuplicates(value.monitoredAttributes)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate monitored attribute: ${duplicate}`,
        path: ['monitoredAttributes'],
      });
    }

    value.monitoredAttributes.forEach((attribute, index) => {
      if (keyFields.includes(attribute)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Business key column '${attribute}' cannot be a monitored attribute`,
          path: ['monitoredAttributes', index],
        });
      }
    });
  });

export type HashAlgorithm = z.infer<typeof hashAlgorithmSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;
export type EngineConfig = z.output<typeof engineConfigSchema>;
export type HistoryColumnsInput = z.infer<typeof historyColumnsSchema>;

/**
 * Render zod issues as one "- path: message" line each
 */
export function formatZodIssues(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}
