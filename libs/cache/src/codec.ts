/**
 * JSON value codec
 */
import type { ZodType } from 'zod';
import { SerializationError, errorMessage } from './errors.js';
import type { ValueCodec } from './interfaces.js';

export class JsonCodec implements ValueCodec {
  encode(value: unknown): string {
    let encoded: string | undefined;
    try {
      encoded = JSON.stringify(value);
    } catch (err) {
      throw new SerializationError(`Failed to encode value: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    // JSON.stringify yields undefined for undefined, functions and symbols
    if (encoded === undefined) {
      throw new SerializationError(`Failed to encode value of type ${typeof value}`);
    }
    return encoded;
  }

  decode<T>(raw: string, schema?: ZodType<T>): T {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new SerializationError(`Failed to decode cached value: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (!schema) {
      // Without a schema the caller vouches for the stored shape.
      return parsed as T;
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new SerializationError(
        `Cached value does not match schema: ${result.error.message}`,
        { cause: result.error }
      );
    }
    return result.data;
  }
}

/**
 * Hash fields and set members: strings are stored verbatim, anything else
 * goes through the codec.
 */
export function encodeField(codec: ValueCodec, field: unknown): string {
  return typeof field === 'string' ? field : codec.encode(field);
}
