import { TRPCError } from '@trpc/server';
import type { TRPC_ERROR_CODE_KEY } from '@trpc/server/unstable-core-do-not-import';

/** Numeric error codes returned to clients as `chat_code`. */
export const ChatErrorCode = {
  INVALID_CREDENTIALS: 1000,
  INVALID_TOKEN: 1001,
  ACCOUNT_EXISTS: 1002,
  NOT_A_MEMBER: 2000,
  NOT_ROOM_ADMIN: 2001,
  ADMIN_REQUIRED: 2002,
  NOT_MESSAGE_SENDER: 2003,
  EMPTY_MESSAGE: 3000,
  INVALID_REPLY: 3001,
  INVALID_ROOM: 3002,
  INVALID_MEMBERS: 3003,
  CHANNEL_EXISTS: 3004,
  ROOM_NOT_FOUND: 4000,
  MESSAGE_NOT_FOUND: 4001,
  USER_NOT_FOUND: 4002,
  CHANNEL_NOT_FOUND: 4003,
} as const;

export type ChatErrorCode = (typeof ChatErrorCode)[keyof typeof ChatErrorCode];

export function chatError(trpcCode: TRPC_ERROR_CODE_KEY, chatCode: ChatErrorCode, message: string): TRPCError {
  return new TRPCError({
    code: trpcCode,
    message,
    cause: new ChatErrorCause(chatCode, message),
  });
}

export class ChatErrorCause extends Error {
  constructor(
    readonly chatCode: ChatErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'ChatErrorCause';
  }
}

export function chatCodeOf(error: unknown): ChatErrorCode | null {
  if (error instanceof TRPCError && error.cause instanceof ChatErrorCause) {
    return error.cause.chatCode;
  }
  return null;
}

/**
 * A call to the push gateway, agent runner or object storage failed.
 * Raised by those clients and caught at the side-effect boundary.
 */
export class ExternalServiceError extends Error {
  constructor(
    readonly service: 'push' | 'agent' | 'storage',
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ExternalServiceError';
  }
}
