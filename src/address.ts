/**
 * Device address codec
 * Parses and formats the 8-byte hardware address used as the filename stem
 * of every stored asset
 */

import { InvalidAddressError } from "./errors";

export const ADDRESS_LENGTH = 8;

const HEX_PATTERN = /^[0-9a-fA-F]+$/;

export class DeviceAddress {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  /**
   * Parse 16 hexadecimal characters (any case) into an address
   *
   * @throws {InvalidAddressError} On wrong length or non-hex characters
   */
  static parse(text: string): DeviceAddress {
    if (text.length !== ADDRESS_LENGTH * 2) {
      throw new InvalidAddressError(
        `MAC must be ${ADDRESS_LENGTH} bytes (${ADDRESS_LENGTH * 2} hex characters) long, got "${text}"`,
      );
    }
    if (!HEX_PATTERN.test(text)) {
      throw new InvalidAddressError(`Could not parse MAC from "${text}"`);
    }

    const bytes = new Uint8Array(ADDRESS_LENGTH);
    for (let i = 0; i < ADDRESS_LENGTH; i++) {
      bytes[i] = parseInt(text.slice(i * 2, i * 2 + 2), 16);
    }
    return new DeviceAddress(bytes);
  }

  /**
   * @throws {InvalidAddressError} Unless given exactly 8 bytes
   */
  static fromBytes(bytes: ArrayLike<number>): DeviceAddress {
    if (bytes.length !== ADDRESS_LENGTH) {
      throw new InvalidAddressError(
        `MAC must be ${ADDRESS_LENGTH} bytes long, got ${bytes.length}`,
      );
    }
    return new DeviceAddress(Uint8Array.from(bytes));
  }

  /**
   * Byte-wise ordering, usable directly as an Array.sort comparator
   */
  static compare(a: DeviceAddress, b: DeviceAddress): number {
    for (let i = 0; i < ADDRESS_LENGTH; i++) {
      const diff = a.bytes[i] - b.bytes[i];
      if (diff !== 0) return diff;
    }
    return 0;
  }

  equals(other: DeviceAddress): boolean {
    return DeviceAddress.compare(this, other) === 0;
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  /**
   * Canonical form: 16 uppercase hex characters, most-significant byte first
   */
  format(): string {
    let out = "";
    for (const b of this.bytes) {
      out += b.toString(16).padStart(2, "0").toUpperCase();
    }
    return out;
  }

  /** Lowercase form used for file names */
  get fileStem(): string {
    return this.format().toLowerCase();
  }

  toString(): string {
    return this.format();
  }

  toJSON(): string {
    return this.format();
  }
}

export function parseAddress(text: string): DeviceAddress {
  return DeviceAddress.parse(text);
}

export function formatAddress(address: DeviceAddress): string {
  return address.format();
}
