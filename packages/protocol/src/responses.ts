import type { ErrorResponseCode, ResponseCode } from "./constants.js";

/** Server → Client responses */

export interface ClientEntry {
  clientId: Buffer;
  name: string;
}

export interface PendingMessage {
  senderId: Buffer;
  messageId: number;
  type: number;
  content: Buffer;
}

export interface RegisteredResponse {
  code: ResponseCode.REGISTERED;
  clientId: Buffer;
}

export interface ClientListResponse {
  code: ResponseCode.CLIENT_LIST;
  clients: ClientEntry[];
}

export interface PublicKeyResponse {
  code: ResponseCode.PUBLIC_KEY;
  clientId: Buffer;
  publicKey: Buffer;
}

export interface MessageSentResponse {
  code: ResponseCode.MESSAGE_SENT;
  recipientId: Buffer;
  messageId: number;
}

export interface PendingMessagesResponse {
  code: ResponseCode.PENDING_MESSAGES;
  messages: PendingMessage[];
}

/** Error responses carry no payload; the code is the diagnostic */
export interface ErrorResponse {
  code: ErrorResponseCode;
}

export type SuccessBody =
  | RegisteredResponse
  | ClientListResponse
  | PublicKeyResponse
  | MessageSentResponse
  | PendingMessagesResponse;

export type ResponseBody = SuccessBody | ErrorResponse;

export interface Response {
  version: number;
  body: ResponseBody;
}
