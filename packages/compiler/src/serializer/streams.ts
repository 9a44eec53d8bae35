/** Destination for serialized bytes. Writes begin at `position`. */
export interface OutputStream {
  readonly position: number;
  write(bytes: Uint8Array): void;
}

const INITIAL_CAPACITY = 1024;

/**
 * Growable in-memory stream. Setting `position` back to zero and writing
 * again overwrites the previous content in place.
 */
export class MemoryOutputStream implements OutputStream {
  #buffer = new Uint8Array(INITIAL_CAPACITY);
  #position = 0;
  #length = 0;

  get position(): number {
    return this.#position;
  }

  set position(value: number) {
    if (!Number.isInteger(value) || value < 0 || value > this.#length) {
      throw new RangeError(`position ${value} is outside of the stream (length ${this.#length})`);
    }
    this.#position = value;
  }

  get length(): number {
    return this.#length;
  }

  write(bytes: Uint8Array): void {
    const end = this.#position + bytes.length;
    this.#ensureCapacity(end);
    this.#buffer.set(bytes, this.#position);
    this.#position = end;
    this.#length = Math.max(this.#length, end);
  }

  /** Rewinds and truncates. */
  reset(): void {
    this.#position = 0;
    this.#length = 0;
  }

  toUint8Array(): Uint8Array {
    return this.#buffer.slice(0, this.#length);
  }

  #ensureCapacity(required: number): void {
    if (required <= this.#buffer.length) return;
    let capacity = this.#buffer.length;
    while (capacity < required) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.#buffer.subarray(0, this.#length));
    this.#buffer = next;
  }
}
