/**
 * Write-once buffer of variable-length byte records
 *
 * Layout of the backing bytes, for `n` records:
 *
 * ```
 * offsets : n x int64 (native byte order), position of record i within payload
 * payload : varint(length_i) bytes_i ... packed in ascending i
 * ```
 *
 * The buffer is filled once by `init` (or by a bulk `copyTo` from another
 * string buffer) and is read-only from then on.
 */

import {
  AbstractDataBuffer,
  BufferOverrunError,
  BufferUnderrunError,
  InvalidArgumentError,
  ReadOnlyViolationError,
  ShapeMismatchError,
} from '@ndkit/core';
import type { DataBuffer, NdArray } from '@ndkit/core';
import { readVarint, varintLength, writeVarint } from './varint';

const OFFSET_BYTES = BigInt64Array.BYTES_PER_ELEMENT;

interface RecordStorage {
  readonly bytes: ArrayBuffer;
  readonly offsets: BigInt64Array;
  readonly payload: Uint8Array;
  /** Payload bytes holding records */
  used: number;
  initialized: boolean;
}

export class StringTensorBuffer extends AbstractDataBuffer<Uint8Array> {
  readonly size: number;
  private readonly storage: RecordStorage;
  /** Index of this view's first record within the storage */
  private readonly first: number;

  private constructor(storage: RecordStorage, first: number, size: number) {
    super();
    this.storage = storage;
    this.first = first;
    this.size = size;
  }

  /**
   * Bytes needed to hold every element of `data`, converted with `toBytes`
   *
   * @example
   * StringTensorBuffer.computeSize(NdArrays.vectorOf('a', 'bb', 'ccc'), UTF_8.encode); // 33
   */
  static computeSize<T>(data: NdArray<T>, toBytes: (value: T) => Uint8Array): number {
    let size = data.size * OFFSET_BYTES;
    for (const scalar of data.scalars()) {
      const length = toBytes(scalar.getValue()).length;
      size += varintLength(length) + length;
    }
    return size;
  }

  /**
   * Uninitialized buffer of `numElements` records over `byteSize` bytes
   *
   * @throws {InvalidArgumentError} If `byteSize` cannot hold the offset table
   */
  static allocate(numElements: number, byteSize: number): StringTensorBuffer {
    if (!Number.isInteger(numElements) || numElements < 0) {
      throw new InvalidArgumentError(`Invalid record count ${String(numElements)}`, { numElements });
    }
    if (!Number.isInteger(byteSize) || byteSize < numElements * OFFSET_BYTES) {
      throw new InvalidArgumentError(
        `${String(byteSize)} bytes cannot hold the offsets of ${numElements.toString()} records`,
        { numElements, byteSize },
      );
    }
    const bytes = new ArrayBuffer(byteSize);
    return new StringTensorBuffer(createStorage(bytes, numElements), 0, numElements);
  }

  /**
   * Initialized buffer over a copy of bytes laid out as described above, such
   * as the output of `toUint8Array()`
   *
   * @throws {InvalidArgumentError} If an offset points outside the payload
   */
  static fromBytes(source: Uint8Array, numElements: number): StringTensorBuffer {
    const buffer = StringTensorBuffer.allocate(numElements, source.length);
    new Uint8Array(buffer.storage.bytes).set(source);

    const { offsets, payload } = buffer.storage;
    let used = 0;
    offsets.forEach((offset, i) => {
      const position = Number(offset);
      if (position < 0 || position >= payload.length) {
        throw new InvalidArgumentError(
          `Offset ${position.toString()} of record ${i.toString()} outside payload of ${payload.length.toString()} bytes`,
          { record: i, offset: position },
        );
      }
      const header = readVarint(payload, position);
      used = Math.max(used, position + header.length + header.value);
    });
    if (used > payload.length) {
      throw new InvalidArgumentError(`Records run past the payload of ${payload.length.toString()} bytes`, {
        used,
        payload: payload.length,
      });
    }
    buffer.storage.used = used;
    buffer.storage.initialized = true;
    return buffer;
  }

  /**
   * Store every element of `data`, in row-major order
   *
   * All elements are converted before anything is written, so a failing
   * conversion leaves the buffer untouched.
   *
   * @throws {ReadOnlyViolationError} If the buffer was already initialized
   * @throws {ShapeMismatchError} If `data` does not have one element per record
   * @throws {BufferOverrunError} If the payload cannot hold the converted records
   */
  init<T>(data: NdArray<T>, toBytes: (value: T) => Uint8Array): this {
    this.checkFillable();
    if (data.size !== this.size) {
      throw new ShapeMismatchError(
        `Cannot store ${data.size.toString()} values in a buffer of ${this.size.toString()} records`,
        { values: data.size, records: this.size },
      );
    }

    const records = data.scalars().toArray().map((scalar) => toBytes(scalar.getValue()));
    const required = records.reduce((total, bytes) => total + varintLength(bytes.length) + bytes.length, 0);
    const { offsets, payload } = this.storage;
    if (required > payload.length) {
      throw new BufferOverrunError(
        `Records need ${required.toString()} payload bytes, buffer has ${payload.length.toString()}`,
        { required, capacity: payload.length },
      );
    }

    let position = 0;
    records.forEach((bytes, i) => {
      offsets[i] = BigInt(position);
      position += writeVarint(payload, position, bytes.length);
      payload.set(bytes, position);
      position += bytes.length;
    });
    this.storage.used = position;
    this.storage.initialized = true;
    return this;
  }

  get isInitialized(): boolean {
    return this.storage.initialized;
  }

  /**
   * Size of the whole backing layout, in bytes
   */
  get byteLength(): number {
    return this.storage.bytes.byteLength;
  }

  /**
   * The whole backing layout; shares memory with this buffer
   */
  toUint8Array(): Uint8Array {
    return new Uint8Array(this.storage.bytes);
  }

  isReadOnly(): boolean {
    return true;
  }

  override copyTo(dst: DataBuffer<Uint8Array>, size: number): this {
    if (dst instanceof StringTensorBuffer && size === this.size) {
      this.copyRecordsTo(dst);
      return this;
    }
    return super.copyTo(dst, size);
  }

  protected getUnchecked(index: number): Uint8Array {
    const { offsets, payload } = this.storage;
    const position = Number(offsets[this.first + index]);
    const header = readVarint(payload, position);
    const start = position + header.length;
    if (start + header.value > payload.length) {
      throw new BufferUnderrunError(
        `Record ${index.toString()} of ${header.value.toString()} bytes runs past the payload`,
        { index, length: header.value, payload: payload.length },
      );
    }
    return payload.slice(start, start + header.value);
  }

  protected setUnchecked(_value: Uint8Array, index: number): void {
    throw new ReadOnlyViolationError('String tensor buffers are read-only', { index });
  }

  protected view(index: number, size: number): DataBuffer<Uint8Array> {
    return new StringTensorBuffer(this.storage, this.first + index, size);
  }

  /**
   * Copy the offset table and the payload bytes used by this view, rebasing
   * the offsets so that the first record lands at payload position 0
   */
  private copyRecordsTo(dst: StringTensorBuffer): void {
    if (dst.size !== this.size) {
      throw new ShapeMismatchError(
        `Cannot copy ${this.size.toString()} records to a buffer of ${dst.size.toString()} records`,
        { source: this.size, destination: dst.size },
      );
    }
    dst.checkFillable();

    const start = this.payloadStart();
    const end = this.payloadEnd();
    if (end - start > dst.storage.payload.length) {
      throw new ShapeMismatchError(
        `Destination payload of ${dst.storage.payload.length.toString()} bytes cannot hold ${(end - start).toString()} bytes`,
        { required: end - start, capacity: dst.storage.payload.length },
      );
    }

    const rebase = BigInt(start);
    for (let i = 0; i < this.size; i++) {
      dst.storage.offsets[i] = this.storage.offsets[this.first + i] - rebase;
    }
    dst.storage.payload.set(this.storage.payload.subarray(start, end));
    dst.storage.used = end - start;
    dst.storage.initialized = true;
  }

  private checkFillable(): void {
    if (this.storage.initialized) {
      throw new ReadOnlyViolationError('String tensor buffer is already initialized', {
        records: this.size,
      });
    }
    if (this.first !== 0 || this.size !== this.storage.offsets.length) {
      throw new InvalidArgumentError('Only a whole string tensor buffer can be initialized', {
        first: this.first,
        size: this.size,
      });
    }
  }

  private payloadStart(): number {
    return this.size > 0 ? Number(this.storage.offsets[this.first]) : 0;
  }

  private payloadEnd(): number {
    if (this.size === 0) {
      return 0;
    }
    const next = this.first + this.size;
    return next < this.storage.offsets.length ? Number(this.storage.offsets[next]) : this.storage.used;
  }
}

function createStorage(bytes: ArrayBuffer, numElements: number): RecordStorage {
  const tableBytes = numElements * OFFSET_BYTES;
  return {
    bytes,
    offsets: new BigInt64Array(bytes, 0, numElements),
    payload: new Uint8Array(bytes, tableBytes),
    used: 0,
    initialized: false,
  };
}
