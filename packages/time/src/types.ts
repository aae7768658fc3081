/**
 * Broken-down calendar time: whole seconds since the epoch plus a
 * nanosecond remainder in [0, 1e9)
 */
export interface CalendarTime {
  readonly seconds: bigint;
  readonly nanoseconds: number;
}

export type Result<E, A> = { _tag: "Ok"; value: A } | { _tag: "Err"; error: E };

export function ok<A>(value: A): Result<never, A> {
  return { _tag: "Ok", value };
}

export function err<E>(error: E): Result<E, never> {
  return { _tag: "Err", error };
}

// Serialization
export interface Serializer<T> {
  serialize(value: T): string;
  deserialize(data: unknown): T;
}
