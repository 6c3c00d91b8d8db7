import {
  CLIENT_ENTRY_SIZE,
  CLIENT_ID_SIZE,
  MESSAGE_PREFIX_SIZE,
  MIN_PROTOCOL_VERSION,
  NAME_SIZE,
  PENDING_RECORD_PREFIX_SIZE,
  PROTOCOL_VERSION,
  PUBLIC_KEY_SIZE,
  REGISTER_PAYLOAD_SIZE,
  REQUEST_HEADER_SIZE,
  RESPONSE_HEADER_SIZE,
  RequestCode,
  ResponseCode,
  isErrorCode,
  isRequestCode,
} from "./constants.js";
import { MalformedHeaderError, MalformedPayloadError, ProtocolError } from "./errors.js";
import type { RequestBody, RequestHeader } from "./requests.js";
import type {
  ClientEntry,
  PendingMessage,
  Response,
  ResponseBody,
} from "./responses.js";

export interface CodecLimits {
  /** Highest request version accepted, and the version written into responses */
  version: number;
  /** Largest payload_size a request header may announce */
  maxPayloadSize: number;
}

export const DEFAULT_LIMITS: CodecLimits = {
  version: PROTOCOL_VERSION,
  maxPayloadSize: 16 * 1024 * 1024,
};

/** Sequential little-endian reader */
export class Cursor {
  constructor(public buf: Buffer, public offset = 0) {}

  get remaining(): number {
    return this.buf.length - this.offset;
  }

  readU8(): number {
    return this.buf.readUInt8(this.offset++);
  }

  readU16(): number {
    const v = this.buf.readUInt16LE(this.offset);
    this.offset += 2;
    return v;
  }

  readU32(): number {
    const v = this.buf.readUInt32LE(this.offset);
    this.offset += 4;
    return v;
  }

  readBytes(len: number): Buffer {
    if (len > this.remaining) {
      throw new RangeError(`Cannot read ${len} bytes, ${this.remaining} left`);
    }
    const v = this.buf.subarray(this.offset, this.offset + len);
    this.offset += len;
    return v;
  }
}

// --- small writers ---

function u8(v: number): Buffer {
  const b = Buffer.allocUnsafe(1);
  b.writeUInt8(v, 0);
  return b;
}

function u16(v: number): Buffer {
  const b = Buffer.allocUnsafe(2);
  b.writeUInt16LE(v, 0);
  return b;
}

function u32(v: number): Buffer {
  const b = Buffer.allocUnsafe(4);
  b.writeUInt32LE(v, 0);
  return b;
}

// --- names ---

/** Non-empty printable ASCII that fits the 255-byte field with its terminator */
export function isValidName(name: string): boolean {
  return /^[\x20-\x7e]+$/.test(name) && name.length < NAME_SIZE;
}

/** Encode a name as a NUL-padded 255-byte field */
export function encodeName(name: string): Buffer {
  if (!isValidName(name)) {
    throw new RangeError(`Invalid client name: ${JSON.stringify(name)}`);
  }
  const field = Buffer.alloc(NAME_SIZE);
  field.write(name, 0, "ascii");
  return field;
}

/** Decode a NUL-terminated 255-byte name field; bytes after the terminator are padding */
export function decodeName(field: Buffer): string {
  if (field.length !== NAME_SIZE) {
    throw new MalformedPayloadError(`Name field must be ${NAME_SIZE} bytes, got ${field.length}`);
  }
  const end = field.indexOf(0);
  if (end === -1) {
    throw new MalformedPayloadError("Name is not NUL-terminated");
  }
  if (end === 0) {
    throw new MalformedPayloadError("Name is empty");
  }
  for (let i = 0; i < end; i++) {
    const byte = field[i];
    if (byte < 0x20 || byte > 0x7e) {
      throw new MalformedPayloadError("Name must be printable ASCII");
    }
  }
  return field.toString("ascii", 0, end);
}

export function clientIdToHex(id: Buffer): string {
  return id.toString("hex");
}

// --- server side: requests in, responses out ---

export function decodeRequestHeader(bytes: Buffer, limits: CodecLimits = DEFAULT_LIMITS): RequestHeader {
  if (bytes.length < REQUEST_HEADER_SIZE) {
    throw new MalformedHeaderError(`Header needs ${REQUEST_HEADER_SIZE} bytes, got ${bytes.length}`);
  }

  const cursor = new Cursor(bytes);
  const clientId = Buffer.from(cursor.readBytes(CLIENT_ID_SIZE));
  const version = cursor.readU8();
  const code = cursor.readU16();
  const payloadSize = cursor.readU32();

  if (version < MIN_PROTOCOL_VERSION || version > limits.version) {
    throw new MalformedHeaderError(`Unsupported protocol version ${version}`);
  }
  if (!isRequestCode(code)) {
    throw new MalformedHeaderError(`Unknown request code ${code}`);
  }
  if (payloadSize > limits.maxPayloadSize) {
    throw new MalformedHeaderError(
      `Payload size ${payloadSize} exceeds the limit of ${limits.maxPayloadSize} bytes`
    );
  }

  return { clientId, version, code, payloadSize };
}

function expectSize(code: RequestCode, payload: Buffer, size: number): void {
  if (payload.length !== size) {
    throw new MalformedPayloadError(
      `Request ${code} expects a ${size}-byte payload, got ${payload.length}`
    );
  }
}

export function decodeRequestBody(code: RequestCode, payload: Buffer): RequestBody {
  switch (code) {
    case RequestCode.REGISTER: {
      expectSize(code, payload, REGISTER_PAYLOAD_SIZE);
      const cursor = new Cursor(payload);
      const name = decodeName(cursor.readBytes(NAME_SIZE));
      const publicKey = Buffer.from(cursor.readBytes(PUBLIC_KEY_SIZE));
      return { code, name, publicKey };
    }
    case RequestCode.CLIENT_LIST:
      expectSize(code, payload, 0);
      return { code };
    case RequestCode.PUBLIC_KEY:
      expectSize(code, payload, CLIENT_ID_SIZE);
      return { code, targetId: Buffer.from(payload) };
    case RequestCode.SEND_MESSAGE: {
      if (payload.length < MESSAGE_PREFIX_SIZE) {
        throw new MalformedPayloadError(
          `Message payload needs at least ${MESSAGE_PREFIX_SIZE} bytes, got ${payload.length}`
        );
      }
      const cursor = new Cursor(payload);
      const recipientId = Buffer.from(cursor.readBytes(CLIENT_ID_SIZE));
      const type = cursor.readU8();
      const contentSize = cursor.readU32();
      if (cursor.remaining !== contentSize) {
        throw new MalformedPayloadError(
          `Content size ${contentSize} does not match the ${cursor.remaining} bytes that follow`
        );
      }
      return { code, recipientId, type, content: Buffer.from(cursor.readBytes(contentSize)) };
    }
    case RequestCode.PENDING_MESSAGES:
      expectSize(code, payload, 0);
      return { code };
  }
}

function encodeClientEntry(entry: ClientEntry): Buffer {
  return Buffer.concat([entry.clientId, encodeName(entry.name)]);
}

function encodePendingMessage(msg: PendingMessage): Buffer {
  return Buffer.concat([
    msg.senderId,
    u32(msg.messageId),
    u8(msg.type),
    u32(msg.content.length),
    msg.content,
  ]);
}

function encodeResponsePayload(body: ResponseBody): Buffer {
  switch (body.code) {
    case ResponseCode.REGISTERED:
      return Buffer.from(body.clientId);
    case ResponseCode.CLIENT_LIST:
      return Buffer.concat(body.clients.map(encodeClientEntry));
    case ResponseCode.PUBLIC_KEY:
      return Buffer.concat([body.clientId, body.publicKey]);
    case ResponseCode.MESSAGE_SENT:
      return Buffer.concat([body.recipientId, u32(body.messageId)]);
    case ResponseCode.PENDING_MESSAGES:
      return Buffer.concat(body.messages.map(encodePendingMessage));
    default:
      return Buffer.alloc(0);
  }
}

/** Encode a response frame: header followed by exactly payload_size bytes */
export function encodeResponse(response: Response): Buffer {
  const payload = encodeResponsePayload(response.body);
  return Buffer.concat([u8(response.version), u16(response.body.code), u32(payload.length), payload]);
}

// --- client side: requests out, responses in ---

function encodeRequestPayload(body: RequestBody): Buffer {
  switch (body.code) {
    case RequestCode.REGISTER:
      return Buffer.concat([encodeName(body.name), body.publicKey]);
    case RequestCode.CLIENT_LIST:
    case RequestCode.PENDING_MESSAGES:
      return Buffer.alloc(0);
    case RequestCode.PUBLIC_KEY:
      return Buffer.from(body.targetId);
    case RequestCode.SEND_MESSAGE:
      return Buffer.concat([body.recipientId, u8(body.type), u32(body.content.length), body.content]);
  }
}

/**
 * Encode a request frame as a client would send it.
 * REGISTER has no identity yet, so its client id is conventionally all zeros.
 */
export function encodeRequest(
  clientId: Buffer,
  body: RequestBody,
  version: number = PROTOCOL_VERSION
): Buffer {
  if (clientId.length !== CLIENT_ID_SIZE) {
    throw new RangeError(`Client id must be ${CLIENT_ID_SIZE} bytes, got ${clientId.length}`);
  }
  const payload = encodeRequestPayload(body);
  return Buffer.concat([clientId, u8(version), u16(body.code), u32(payload.length), payload]);
}

function decodeResponseBody(code: number, payload: Buffer): ResponseBody {
  const cursor = new Cursor(payload);

  switch (code) {
    case ResponseCode.REGISTERED:
      if (payload.length !== CLIENT_ID_SIZE) break;
      return { code: ResponseCode.REGISTERED, clientId: Buffer.from(payload) };
    case ResponseCode.CLIENT_LIST: {
      if (payload.length % CLIENT_ENTRY_SIZE !== 0) break;
      const clients: ClientEntry[] = [];
      while (cursor.remaining > 0) {
        const clientId = Buffer.from(cursor.readBytes(CLIENT_ID_SIZE));
        clients.push({ clientId, name: decodeName(cursor.readBytes(NAME_SIZE)) });
      }
      return { code: ResponseCode.CLIENT_LIST, clients };
    }
    case ResponseCode.PUBLIC_KEY:
      if (payload.length !== CLIENT_ID_SIZE + PUBLIC_KEY_SIZE) break;
      return {
        code: ResponseCode.PUBLIC_KEY,
        clientId: Buffer.from(cursor.readBytes(CLIENT_ID_SIZE)),
        publicKey: Buffer.from(cursor.readBytes(PUBLIC_KEY_SIZE)),
      };
    case ResponseCode.MESSAGE_SENT:
      if (payload.length !== CLIENT_ID_SIZE + 4) break;
      return {
        code: ResponseCode.MESSAGE_SENT,
        recipientId: Buffer.from(cursor.readBytes(CLIENT_ID_SIZE)),
        messageId: cursor.readU32(),
      };
    case ResponseCode.PENDING_MESSAGES: {
      const messages: PendingMessage[] = [];
      while (cursor.remaining > 0) {
        if (cursor.remaining < PENDING_RECORD_PREFIX_SIZE) {
          throw new MalformedPayloadError("Truncated pending message record");
        }
        const senderId = Buffer.from(cursor.readBytes(CLIENT_ID_SIZE));
        const messageId = cursor.readU32();
        const type = cursor.readU8();
        const size = cursor.readU32();
        if (size > cursor.remaining) {
          throw new MalformedPayloadError("Truncated pending message content");
        }
        messages.push({ senderId, messageId, type, content: Buffer.from(cursor.readBytes(size)) });
      }
      return { code: ResponseCode.PENDING_MESSAGES, messages };
    }
    default:
      if (isErrorCode(code)) return { code };
      throw new ProtocolError(`Unknown response code ${code}`);
  }

  throw new MalformedPayloadError(`Response ${code} has an unexpected ${payload.length}-byte payload`);
}

/** Decode one complete response frame */
export function decodeResponse(bytes: Buffer): Response {
  if (bytes.length < RESPONSE_HEADER_SIZE) {
    throw new MalformedHeaderError(`Response header needs ${RESPONSE_HEADER_SIZE} bytes, got ${bytes.length}`);
  }
  const cursor = new Cursor(bytes);
  const version = cursor.readU8();
  const code = cursor.readU16();
  const payloadSize = cursor.readU32();
  if (cursor.remaining !== payloadSize) {
    throw new MalformedPayloadError(
      `Response announces ${payloadSize} payload bytes but carries ${cursor.remaining}`
    );
  }
  return { version, body: decodeResponseBody(code, cursor.readBytes(payloadSize)) };
}
