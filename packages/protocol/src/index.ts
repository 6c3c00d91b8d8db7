export {
  PROTOCOL_VERSION,
  MIN_PROTOCOL_VERSION,
  CLIENT_ID_SIZE,
  NAME_SIZE,
  PUBLIC_KEY_SIZE,
  REQUEST_HEADER_SIZE,
  RESPONSE_HEADER_SIZE,
  REGISTER_PAYLOAD_SIZE,
  MESSAGE_PREFIX_SIZE,
  PENDING_RECORD_PREFIX_SIZE,
  CLIENT_ENTRY_SIZE,
  MAX_U32,
  RequestCode,
  ResponseCode,
  MessageType,
  isRequestCode,
  isErrorCode,
  type ErrorResponseCode,
} from "./constants.js";

export {
  Cursor,
  DEFAULT_LIMITS,
  isValidName,
  encodeName,
  decodeName,
  clientIdToHex,
  decodeRequestHeader,
  decodeRequestBody,
  encodeResponse,
  encodeRequest,
  decodeResponse,
  type CodecLimits,
} from "./codec.js";

export { ProtocolError, MalformedHeaderError, MalformedPayloadError } from "./errors.js";

export type {
  RequestHeader,
  RegisterRequest,
  ClientListRequest,
  PublicKeyRequest,
  SendMessageRequest,
  PendingMessagesRequest,
  RequestBody,
  Request,
} from "./requests.js";

export type {
  ClientEntry,
  PendingMessage,
  RegisteredResponse,
  ClientListResponse,
  PublicKeyResponse,
  MessageSentResponse,
  PendingMessagesResponse,
  ErrorResponse,
  SuccessBody,
  ResponseBody,
  Response,
} from "./responses.js";
