import type { z } from 'zod';

const runtimeFields = new WeakSet<z.ZodTypeAny>();

/**
 * Mark a field schema as runtime-only: the value is bound by the runner and is
 * readable through GAOM lookups only in a runtime context.
 */
export function runtimeField<T extends z.ZodTypeAny>(schema: T): T {
  runtimeFields.add(schema);
  return schema;
}

export const isRuntimeField = (schema: z.ZodTypeAny): boolean => runtimeFields.has(schema);
