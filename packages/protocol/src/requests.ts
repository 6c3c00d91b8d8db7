import type { RequestCode } from "./constants.js";

/** Client → Server requests */

export interface RequestHeader {
  /** Caller's client id; ignored for REGISTER */
  clientId: Buffer;
  version: number;
  code: RequestCode;
  payloadSize: number;
}

export interface RegisterRequest {
  code: RequestCode.REGISTER;
  name: string;
  publicKey: Buffer;
}

export interface ClientListRequest {
  code: RequestCode.CLIENT_LIST;
}

export interface PublicKeyRequest {
  code: RequestCode.PUBLIC_KEY;
  targetId: Buffer;
}

export interface SendMessageRequest {
  code: RequestCode.SEND_MESSAGE;
  recipientId: Buffer;
  type: number;
  content: Buffer;
}

export interface PendingMessagesRequest {
  code: RequestCode.PENDING_MESSAGES;
}

/** Union of all request payload shapes, discriminated by request code */
export type RequestBody =
  | RegisterRequest
  | ClientListRequest
  | PublicKeyRequest
  | SendMessageRequest
  | PendingMessagesRequest;

export interface Request {
  header: RequestHeader;
  body: RequestBody;
}
