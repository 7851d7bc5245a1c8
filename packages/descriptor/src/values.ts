import { z } from 'zod';

/** Schema-free value carried opaquely in payload params and command params. */
export type DescriptorValue = string | number | boolean | null | DescriptorValue[] | DescriptorMap;

export type DescriptorMap = { [key: string]: DescriptorValue };

export const descriptorValueSchema: z.ZodType<DescriptorValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(descriptorValueSchema),
    z.record(z.string(), descriptorValueSchema),
  ]),
);

export const descriptorMapSchema: z.ZodType<DescriptorMap> = z.record(z.string(), descriptorValueSchema);

export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === 'object' && !Array.isArray(value);

export const isDescriptorMap = (value: DescriptorValue | undefined): value is DescriptorMap =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

export const isStringList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');
