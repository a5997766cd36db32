/* Converter
 *
 * Coerces loosely typed values (property strings, by-name call arguments,
 * constructor arguments) to declared parameter types. Conversion is
 * all-or-nothing: convertAll either returns a complete argument list or a
 * failure, never a partially converted one.
 *
 * Primitive coercions are zod schemas; capabilities match structurally (an
 * object exposing every method of the capability, proxies included), classes
 * match with instanceof.
 */
import { z } from 'zod';

import { CoercionError } from '../errors/errors.js';
import type { Result, TypeRef } from '../types/types.js';
import { capabilityMethods, isCapability } from './capability.js';
import { isAssignable, isPrimitiveType, runtimeTypeOf, typeName, type PrimitiveName } from './type-ref.js';

export interface Converter {
  convert(value: unknown, type: TypeRef): Result<unknown, CoercionError>;
  convertAll(values: readonly unknown[], types: readonly TypeRef[]): Result<unknown[], CoercionError>;
}

const integerString = z.string().trim().regex(/^[-+]?\d+$/);

const schemas: Partial<Record<PrimitiveName, z.ZodType<unknown>>> = {
  string: z.union([
    z.string(),
    z.union([z.number(), z.boolean(), z.bigint()]).transform((v) => String(v)),
  ]),
  number: z.union([
    z.number(),
    z.string().trim().min(1).pipe(z.coerce.number().finite()),
  ]),
  boolean: z.union([
    z.boolean(),
    z
      .string()
      .trim()
      .toLowerCase()
      .pipe(z.enum(['true', 'false']))
      .transform((v) => v === 'true'),
  ]),
  bigint: z.union([
    z.bigint(),
    z.number().int().transform((v) => BigInt(v)),
    integerString.transform((v) => BigInt(v)),
  ]),
  symbol: z.symbol(),
  object: z.custom<object>((v) => typeof v === 'object' && v !== null, 'expected an object'),
  function: z.custom<(...args: never[]) => unknown>((v) => typeof v === 'function', 'expected a function'),
};

const dateSchema = z.union([
  z.date(),
  z.string().trim().min(1).pipe(z.coerce.date()),
  z.number().finite().pipe(z.coerce.date()),
]);

const ok = <T>(value: T): Result<T, CoercionError> => ({ ok: true, value });
const fail = (value: unknown, type: TypeRef, issue?: string): Result<never, CoercionError> => ({
  ok: false,
  error: new CoercionError(value, typeName(type), issue),
});

/**
 * Default converter.
 */
export class StandardConverter implements Converter {
  convert(value: unknown, type: TypeRef): Result<unknown, CoercionError> {
    if (isPrimitiveType(type)) {
      if (type.name === 'unknown') return ok(value);
      const schema = schemas[type.name];
      if (!schema) return fail(value, type);
      const parsed = schema.safeParse(value);
      return parsed.success ? ok(parsed.data) : fail(value, type, parsed.error.issues[0]?.message);
    }

    if (isCapability(type)) {
      if (isAssignable(type, runtimeTypeOf(value))) return ok(value);
      if (typeof value !== 'object' || value === null) return fail(value, type);
      for (const name of capabilityMethods(type).keys()) {
        if (typeof Reflect.get(value, name) !== 'function') {
          return fail(value, type, `missing method '${name}'`);
        }
      }
      return ok(value);
    }

    if (value instanceof type) return ok(value);
    if (type === Date) {
      const parsed = dateSchema.safeParse(value);
      return parsed.success ? ok(parsed.data) : fail(value, type, parsed.error.issues[0]?.message);
    }
    return fail(value, type);
  }

  convertAll(values: readonly unknown[], types: readonly TypeRef[]): Result<unknown[], CoercionError> {
    if (values.length !== types.length) {
      return {
        ok: false,
        error: new CoercionError(values, `(${types.map(typeName).join(',')})`, 'arity mismatch'),
      };
    }
    const out: unknown[] = [];
    for (let i = 0; i < values.length; i++) {
      const converted = this.convert(values[i], types[i]);
      if (!converted.ok) return converted;
      out.push(converted.value);
    }
    return ok(out);
  }
}

/** Shared default instance */
export const defaultConverter: Converter = new StandardConverter();
