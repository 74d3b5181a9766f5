import type { MemoryErrorCode } from "@sovereign/shared";

export class MemoryStoreError extends Error {
  readonly code: MemoryErrorCode;

  constructor(code: MemoryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MemoryStoreError";
    this.code = code;
  }
}

export function invalidInput(message: string): MemoryStoreError {
  return new MemoryStoreError("INVALID_INPUT", message);
}

export function storageUnavailable(message: string, cause?: unknown): MemoryStoreError {
  const detail = cause instanceof Error ? `: ${cause.message}` : "";
  return new MemoryStoreError("STORAGE_UNAVAILABLE", `${message}${detail}`, { cause });
}

export function isMemoryStoreError(err: unknown): err is MemoryStoreError {
  return err instanceof MemoryStoreError;
}
