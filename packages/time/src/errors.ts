export class Int64RangeError extends RangeError {
  readonly value: bigint;

  constructor(label: string, value: bigint) {
    super(`${label} does not fit a signed 64-bit integer: ${value}`);
    this.name = "Int64RangeError";
    this.value = value;
  }
}

export class NarrowingError extends RangeError {
  readonly target: "i32" | "u32";
  readonly value: bigint;

  constructor(target: "i32" | "u32", value: bigint) {
    super(`${value} ticks is out of range for ${target}`);
    this.name = "NarrowingError";
    this.target = target;
    this.value = value;
  }
}

export class SerializationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SerializationError";
  }
}
