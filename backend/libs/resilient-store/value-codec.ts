import { ValueEncodingError, describeError } from './resilient-store.errors';

/** Turns a caller's value into the bytes written to the store */
export type ValueEncoder<T> = (value: T) => Buffer;

export function jsonEncoder<T>(value: T): Buffer {
  let json: string | undefined;
  try {
    json = JSON.stringify(value);
  } catch (error) {
    throw new ValueEncodingError(
      `Value is not JSON serializable: ${describeError(error)}`,
      { cause: error },
    );
  }
  if (json === undefined) {
    throw new ValueEncodingError(`Value of type ${typeof value} has no JSON form`);
  }
  return Buffer.from(json, 'utf8');
}

export function decodeJson(bytes: Buffer): unknown {
  return JSON.parse(bytes.toString('utf8'));
}
