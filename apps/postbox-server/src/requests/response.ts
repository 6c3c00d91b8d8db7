import {
  ProtocolError,
  ResponseCode,
  type ErrorResponseCode,
  type Response,
} from "@postbox/protocol";
import { NameTakenError, UnknownClientError } from "../store/errors.js";
import type { Outcome } from "./handler.js";

export interface ResponseOptions {
  /** Version written into the response header */
  version: number;
  /** Collapse every error code to GENERIC_ERROR */
  legacyErrors: boolean;
}

export function errorCodeFor(error: Error): ErrorResponseCode {
  if (error instanceof NameTakenError) return ResponseCode.NAME_TAKEN;
  if (error instanceof UnknownClientError) return ResponseCode.UNKNOWN_CLIENT;
  if (error instanceof ProtocolError) return ResponseCode.MALFORMED_REQUEST;
  return ResponseCode.GENERIC_ERROR;
}

/** Turn a dispatch outcome into the response frame to send back */
export function buildResponse(outcome: Outcome, options: ResponseOptions): Response {
  if (outcome.ok) {
    return { version: options.version, body: outcome.body };
  }
  const code: ErrorResponseCode = options.legacyErrors ? ResponseCode.GENERIC_ERROR : errorCodeFor(outcome.error);
  return { version: options.version, body: { code } };
}
