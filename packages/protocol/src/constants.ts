/** Protocol version the server speaks and writes into every response header */
export const PROTOCOL_VERSION = 2;

/** Oldest request version still accepted */
export const MIN_PROTOCOL_VERSION = 1;

export const CLIENT_ID_SIZE = 16;
export const NAME_SIZE = 255;
export const PUBLIC_KEY_SIZE = 160;

/** client_id[16] | version u8 | code u16 | payload_size u32 */
export const REQUEST_HEADER_SIZE = CLIENT_ID_SIZE + 1 + 2 + 4;

/** version u8 | code u16 | payload_size u32 */
export const RESPONSE_HEADER_SIZE = 1 + 2 + 4;

export const REGISTER_PAYLOAD_SIZE = NAME_SIZE + PUBLIC_KEY_SIZE;

/** recipient_id[16] | type u8 | content_size u32, before the content bytes */
export const MESSAGE_PREFIX_SIZE = CLIENT_ID_SIZE + 1 + 4;

/** sender_id[16] | message_id u32 | type u8 | content_size u32, before the content bytes */
export const PENDING_RECORD_PREFIX_SIZE = CLIENT_ID_SIZE + 4 + 1 + 4;

export const CLIENT_ENTRY_SIZE = CLIENT_ID_SIZE + NAME_SIZE;

/** Largest value a u32 wire field carries: message ids and payload sizes */
export const MAX_U32 = 0xffffffff;

export enum RequestCode {
  REGISTER = 600,
  CLIENT_LIST = 601,
  PUBLIC_KEY = 602,
  SEND_MESSAGE = 603,
  PENDING_MESSAGES = 604,
}

export enum ResponseCode {
  REGISTERED = 2100,
  CLIENT_LIST = 2101,
  PUBLIC_KEY = 2102,
  MESSAGE_SENT = 2103,
  PENDING_MESSAGES = 2104,
  GENERIC_ERROR = 9000,
  NAME_TAKEN = 9001,
  UNKNOWN_CLIENT = 9002,
  MALFORMED_REQUEST = 9003,
}

export type ErrorResponseCode =
  | ResponseCode.GENERIC_ERROR
  | ResponseCode.NAME_TAKEN
  | ResponseCode.UNKNOWN_CLIENT
  | ResponseCode.MALFORMED_REQUEST;

/** Known message types. The server stores any u8 value unchanged. */
export enum MessageType {
  KEY_REQUEST = 1,
  KEY_SEND = 2,
  TEXT = 3,
  FILE = 4,
}

const REQUEST_CODES: ReadonlySet<number> = new Set([
  RequestCode.REGISTER,
  RequestCode.CLIENT_LIST,
  RequestCode.PUBLIC_KEY,
  RequestCode.SEND_MESSAGE,
  RequestCode.PENDING_MESSAGES,
]);

export function isRequestCode(code: number): code is RequestCode {
  return REQUEST_CODES.has(code);
}

export function isErrorCode(code: number): code is ErrorResponseCode {
  return (
    code === ResponseCode.GENERIC_ERROR ||
    code === ResponseCode.NAME_TAKEN ||
    code === ResponseCode.UNKNOWN_CLIENT ||
    code === ResponseCode.MALFORMED_REQUEST
  );
}
