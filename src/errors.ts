/**
 * Error classes for the image store.
 *
 * Messages name the device and the operation but never a filesystem path;
 * the underlying I/O error, if any, is kept as `cause`.
 */

export type StoreOperation =
  | "parse-address"
  | "list-devices"
  | "read-asset"
  | "delete-device"
  | "render-and-store";

export type StoreErrorKind =
  | "invalid-address"
  | "invalid-vector-input"
  | "asset-not-found"
  | "store-unavailable";

export abstract class StoreError extends Error {
  abstract readonly kind: StoreErrorKind;

  constructor(
    message: string,
    readonly operation: StoreOperation,
    readonly address?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StoreError";
  }
}

export class InvalidAddressError extends StoreError {
  readonly kind = "invalid-address";

  constructor(message: string) {
    super(message, "parse-address");
    this.name = "InvalidAddressError";
  }
}

export class InvalidVectorInputError extends StoreError {
  readonly kind = "invalid-vector-input";

  constructor(address: string, options?: { cause?: unknown }) {
    super(`Invalid SVG for device ${address}`, "render-and-store", address, options);
    this.name = "InvalidVectorInputError";
  }
}

export class AssetNotFoundError extends StoreError {
  readonly kind = "asset-not-found";

  constructor(
    message: string,
    operation: StoreOperation,
    address: string,
    options?: { cause?: unknown },
  ) {
    super(message, operation, address, options);
    this.name = "AssetNotFoundError";
  }
}

export class StoreUnavailableError extends StoreError {
  readonly kind = "store-unavailable";

  constructor(
    message: string,
    operation: StoreOperation,
    address?: string,
    options?: { cause?: unknown },
  ) {
    super(message, operation, address, options);
    this.name = "StoreUnavailableError";
  }
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError;
}
