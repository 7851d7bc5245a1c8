import type { z } from 'zod';

import { ValidationError } from './errors';

export const formatPath = (path: ReadonlyArray<string | number>): string =>
  path.reduce<string>((acc, part) => {
    if (typeof part === 'number') return `${acc}[${part}]`;
    return acc ? `${acc}.${part}` : part;
  }, '');

const joinPath = (path: ReadonlyArray<string | number>, key: string): string => formatPath([...path, key]);

/**
 * Translate a zod failure into a ValidationError, listing unexpected and
 * missing keys by their dotted path.
 */
export function toValidationError(subject: string, error: z.ZodError): ValidationError {
  const issues: string[] = [];
  const unexpectedKeys: string[] = [];
  const missingKeys: string[] = [];

  for (const issue of error.issues) {
    const where = formatPath(issue.path);
    if (issue.code === 'unrecognized_keys') {
      unexpectedKeys.push(...issue.keys.map((key) => joinPath(issue.path, key)));
      issues.push(`Unexpected keys: \`${issue.keys.join(', ')}\`${where ? ` at \`${where}\`` : ''}`);
      continue;
    }
    if (issue.code === 'invalid_type' && issue.received === 'undefined') {
      missingKeys.push(where);
      issues.push(`Missing key: \`${where}\``);
      continue;
    }
    issues.push(where ? `\`${where}\`: ${issue.message}` : issue.message);
  }

  return new ValidationError({ subject, issues, unexpectedKeys, missingKeys });
}

export function parseWith<S extends z.ZodTypeAny>(subject: string, schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw toValidationError(subject, parsed.error);
  return parsed.data;
}
