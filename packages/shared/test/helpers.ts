import type { LineSource } from "../src/http1.js";

/**
 * In-memory LineSource over a fixed byte string. Reads past the end reject,
 * the way a stream that ended early would.
 */
export function bufferSource(
  data: Uint8Array | string,
): LineSource & { remaining(): Uint8Array } {
  const bytes =
    typeof data === "string" ? new TextEncoder().encode(data) : data;
  let offset = 0;

  function indexOf(delimiter: Uint8Array, from: number): number {
    outer: for (let i = from; i + delimiter.length <= bytes.length; i++) {
      for (let j = 0; j < delimiter.length; j++) {
        if (bytes[i + j] !== delimiter[j]) continue outer;
      }
      return i;
    }
    return -1;
  }

  return {
    async readExactly(length: number): Promise<Uint8Array> {
      if (offset + length > bytes.length) {
        throw new Error(
          `Source ended with ${bytes.length - offset} of ${length} bytes`,
        );
      }
      const out = bytes.slice(offset, offset + length);
      offset += length;
      return out;
    },
    async readUntil(delimiter: Uint8Array, maxLength: number) {
      const index = indexOf(delimiter, offset);
      if (index === -1 || index + delimiter.length - offset > maxLength) {
        throw new Error("Delimiter not found");
      }
      const out = bytes.slice(offset, index + delimiter.length);
      offset = index + delimiter.length;
      return out;
    },
    remaining(): Uint8Array {
      return bytes.slice(offset);
    },
  };
}

export function bytes(...values: number[]): Uint8Array {
  return Uint8Array.from(values);
}

export function text(data: Uint8Array): string {
  return new TextDecoder().decode(data);
}
