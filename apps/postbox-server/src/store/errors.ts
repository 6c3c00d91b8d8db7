import { clientIdToHex } from "@postbox/protocol";

export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}

export class NameTakenError extends StoreError {
  constructor(public readonly clientName: string) {
    super(`Name "${clientName}" is already registered`);
    this.name = "NameTakenError";
  }
}

export class UnknownClientError extends StoreError {
  constructor(public readonly clientId: Buffer) {
    super(`Unknown client ${clientIdToHex(clientId)}`);
    this.name = "UnknownClientError";
  }
}

/** The next message id would not fit the 32-bit wire field */
export class MessageIdExhaustedError extends StoreError {
  constructor(public readonly messageId: number) {
    super(`Message id ${messageId} exceeds the 32-bit range`);
    this.name = "MessageIdExhaustedError";
  }
}

/** A pending message is larger than a single drain may return */
export class MessageTooLargeError extends StoreError {
  constructor(
    public readonly messageId: number,
    public readonly recordSize: number,
    public readonly limit: number
  ) {
    super(`Message ${messageId} needs ${recordSize} bytes, a drain may return ${limit}`);
    this.name = "MessageTooLargeError";
  }
}

/** A storage operation failed for reasons unrelated to the request's content */
export class StoreFailureError extends StoreError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed: ${detail}`, { cause });
    this.name = "StoreFailureError";
  }
}
