import { z } from 'zod';

import { dappSchema, type DappTree } from '../dapp.schema';
import { GaomLookupError, GaomRuntimeLookupError } from '../errors';
import { isPlainObject } from '../values';
import { parseQuery, type QueryStep } from './query';
import { isRuntimeField } from './runtime';

// `undefined` marks an opaque subtree (payload params, command params) that is walked by value only.
type Cursor = { schema: z.ZodTypeAny | undefined; value: unknown };

function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
  let current = schema;
  for (;;) {
    if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) current = current.unwrap();
    else if (current instanceof z.ZodDefault) current = current.removeDefault();
    else if (current instanceof z.ZodEffects) current = current.innerType();
    else if (current instanceof z.ZodLazy) current = current.schema;
    else return current;
  }
}

function fieldSchema(schema: z.AnyZodObject, key: string): z.ZodTypeAny | undefined {
  const shape: Record<string, z.ZodTypeAny> = schema.shape;
  if (Object.hasOwn(shape, key)) return shape[key];
  const catchall: z.ZodTypeAny = schema._def.catchall;
  return catchall instanceof z.ZodNever ? undefined : catchall;
}

function stepKey(cursor: Cursor, key: string, path: string, isRuntime: boolean): Cursor {
  const schema = cursor.schema && unwrap(cursor.schema);
  const { value } = cursor;
  if (!isPlainObject(value)) throw new GaomLookupError(path);

  let next: z.ZodTypeAny | undefined;
  if (schema instanceof z.ZodObject) {
    next = fieldSchema(schema, key);
    if (!next) throw new GaomLookupError(path);
    if (isRuntimeField(next) && !isRuntime) throw new GaomRuntimeLookupError(path);
  } else if (schema instanceof z.ZodRecord) {
    next = schema.valueSchema;
  } else if (schema !== undefined && !(schema instanceof z.ZodUnion)) {
    throw new GaomLookupError(path);
  }

  if (!Object.hasOwn(value, key) || value[key] === undefined) throw new GaomLookupError(path);
  return { schema: next, value: value[key] };
}

function stepIndex(cursor: Cursor, index: number, path: string): Cursor {
  const schema = cursor.schema && unwrap(cursor.schema);
  const { value } = cursor;
  if (!Array.isArray(value) || index >= value.length) throw new GaomLookupError(path);

  let next: z.ZodTypeAny | undefined;
  if (schema instanceof z.ZodArray) next = schema.element;
  else if (schema !== undefined && !(schema instanceof z.ZodUnion)) throw new GaomLookupError(path);

  const item: unknown = value[index];
  return { schema: next, value: item };
}

/**
 * Resolve `path` against `root`, guided by the declared `schema`. Fields
 * marked with `runtimeField` are readable only when `isRuntime` is set.
 * Always returns a deep copy.
 */
export function lookupIn(schema: z.ZodTypeAny, root: unknown, path: string, isRuntime = false): unknown {
  const steps: QueryStep[] = parseQuery(path);
  let cursor: Cursor = { schema, value: root };
  for (const step of steps) {
    cursor = step.kind === 'key' ? stepKey(cursor, step.key, path, isRuntime) : stepIndex(cursor, step.index, path);
  }
  return structuredClone(cursor.value);
}

export const lookup = (root: DappTree, path: string, isRuntime = false): unknown =>
  lookupIn(dappSchema, root, path, isRuntime);
