import type { ZodType, ZodTypeDef } from 'zod';

/** Turns raw message bytes into an untyped value; throws when the bytes are not readable. */
export type PayloadDecoder = (bytes: Uint8Array) => unknown;

/**
 * A candidate shape for inbound message bodies.
 *
 * `tryDecode` returns `undefined` when the bytes do not describe a value of this type.
 * It must not throw.
 */
export interface PayloadType<T> {
  readonly name: string;
  tryDecode(bytes: Uint8Array, decoder: PayloadDecoder): T | undefined;
}

export interface DecodedPayload<T> {
  type: string;
  value: T;
}

export interface JsonDecoderOptions {
  reviver?: (this: unknown, key: string, value: unknown) => unknown;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

export const textDecoder: PayloadDecoder = (bytes) => utf8.decode(bytes);

export function createJsonDecoder(options: JsonDecoderOptions = {}): PayloadDecoder {
  return (bytes) => {
    const parsed: unknown = JSON.parse(utf8.decode(bytes), options.reviver);
    return parsed;
  };
}

export const jsonDecoder: PayloadDecoder = createJsonDecoder();

function safeDecode(bytes: Uint8Array, decoder: PayloadDecoder): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: decoder(bytes) };
  } catch {
    return { ok: false };
  }
}

/** Candidate validated by a zod schema after decoding. */
export function payloadType<T>(name: string, schema: ZodType<T, ZodTypeDef, unknown>): PayloadType<T> {
  return {
    name,
    tryDecode(bytes, decoder) {
      const decoded = safeDecode(bytes, decoder);
      if (!decoded.ok) return undefined;
      const result = schema.safeParse(decoded.value);
      return result.success ? result.data : undefined;
    },
  };
}

/** Candidate validated by a type guard after decoding. */
export function guardPayloadType<T>(name: string, guard: (value: unknown) => value is T): PayloadType<T> {
  return {
    name,
    tryDecode(bytes, decoder) {
      const decoded = safeDecode(bytes, decoder);
      if (!decoded.ok) return undefined;
      try {
        return guard(decoded.value) ? decoded.value : undefined;
      } catch {
        return undefined;
      }
    },
  };
}

/**
 * Tries each candidate in order and returns the first match.
 * A candidate that throws anyway counts as a mismatch.
 */
export function decodePayload<T>(
  bytes: Uint8Array,
  types: readonly PayloadType<T>[],
  decoder: PayloadDecoder
): DecodedPayload<T> | undefined {
  for (const candidate of types) {
    let value: T | undefined;
    try {
      value = candidate.tryDecode(bytes, decoder);
    } catch {
      value = undefined;
    }
    if (value !== undefined) {
      return { type: candidate.name, value };
    }
  }
  return undefined;
}
