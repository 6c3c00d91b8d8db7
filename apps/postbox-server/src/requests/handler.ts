import { constants as bufferConstants } from "node:buffer";
import {
  MAX_U32,
  RESPONSE_HEADER_SIZE,
  RequestCode,
  ResponseCode,
  type ClientListResponse,
  type MessageSentResponse,
  type PendingMessagesResponse,
  type PublicKeyResponse,
  type RegisteredResponse,
  type Request,
  type RegisterRequest,
  type PublicKeyRequest,
  type SendMessageRequest,
  type SuccessBody,
} from "@postbox/protocol";
import type { Store } from "../store/store.js";

/** Largest PENDING_MESSAGES payload one response frame can carry */
export const MAX_BATCH_BYTES = Math.min(MAX_U32, bufferConstants.MAX_LENGTH - RESPONSE_HEADER_SIZE);

export interface DispatchOptions {
  /** Encoded size bound for one PENDING_MESSAGES batch */
  maxBatchBytes?: number;
}

export type Outcome =
  | { ok: true; body: SuccessBody }
  | { ok: false; error: Error };

/**
 * Execute one decoded request against the store.
 *
 * Every request but REGISTER names its caller in the header. The caller's
 * last_seen is bumped in the same transaction as the request's effect, so a
 * failed request leaves no trace. A drain takes only as many messages as one
 * response can encode; the rest wait for the next PENDING_MESSAGES.
 */
export function dispatch(request: Request, store: Store, options: DispatchOptions = {}): Outcome {
  const caller = request.header.clientId;
  const body = request.body;

  try {
    switch (body.code) {
      case RequestCode.REGISTER:
        return success(handleRegister(store, body));
      case RequestCode.CLIENT_LIST:
        return success(handleClientList(store, caller));
      case RequestCode.PUBLIC_KEY:
        return success(handlePublicKey(store, caller, body));
      case RequestCode.SEND_MESSAGE:
        return success(handleSendMessage(store, caller, body));
      case RequestCode.PENDING_MESSAGES:
        return success(handlePendingMessages(store, caller, options.maxBatchBytes ?? MAX_BATCH_BYTES));
    }
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
  }
}

function success(body: SuccessBody): Outcome {
  return { ok: true, body };
}

function handleRegister(store: Store, req: RegisterRequest): RegisteredResponse {
  const clientId = store.createClient(req.name, req.publicKey);
  return { code: ResponseCode.REGISTERED, clientId };
}

function handleClientList(store: Store, caller: Buffer): ClientListResponse {
  return store.atomically((): ClientListResponse => {
    store.touch(caller);
    const clients = store.listClients(caller).map((c) => ({ clientId: c.id, name: c.name }));
    return { code: ResponseCode.CLIENT_LIST, clients };
  });
}

function handlePublicKey(store: Store, caller: Buffer, req: PublicKeyRequest): PublicKeyResponse {
  return store.atomically((): PublicKeyResponse => {
    store.touch(caller);
    const target = store.getClient(req.targetId);
    return { code: ResponseCode.PUBLIC_KEY, clientId: target.id, publicKey: target.publicKey };
  });
}

function handleSendMessage(store: Store, caller: Buffer, req: SendMessageRequest): MessageSentResponse {
  return store.atomically((): MessageSentResponse => {
    store.touch(caller);
    const messageId = store.enqueueMessage({
      recipientId: req.recipientId,
      senderId: caller,
      type: req.type,
      content: req.content,
    });
    return { code: ResponseCode.MESSAGE_SENT, recipientId: req.recipientId, messageId };
  });
}

function handlePendingMessages(store: Store, caller: Buffer, maxBatchBytes: number): PendingMessagesResponse {
  return store.atomically((): PendingMessagesResponse => {
    store.touch(caller);
    const messages = store.drainMessages(caller, maxBatchBytes).map((m) => ({
      senderId: m.senderId,
      messageId: m.id,
      type: m.type,
      content: m.content,
    }));
    return { code: ResponseCode.PENDING_MESSAGES, messages };
  });
}
