/**
 * Gateway opcodes and close codes, plus the rules deciding what a close
 * code means for the shard: resume, identify again, or stop.
 */

export enum OpCode {
  DISPATCH = 0,
  HEARTBEAT = 1,
  IDENTIFY = 2,
  PRESENCE_UPDATE = 3,
  VOICE_STATE_UPDATE = 4,
  RESUME = 6,
  RECONNECT = 7,
  REQUEST_GUILD_MEMBERS = 8,
  INVALID_SESSION = 9,
  HELLO = 10,
  HEARTBEAT_ACK = 11,
}

export enum CloseCode {
  NORMAL_CLOSURE = 1000,
  GOING_AWAY = 1001,
  ABNORMAL_CLOSURE = 1006,
  /** Sent by the client when it drops a connection it intends to resume. */
  DO_NOT_INVALIDATE_SESSION = 3000,
  UNKNOWN_ERROR = 4000,
  UNKNOWN_OPCODE = 4001,
  DECODE_ERROR = 4002,
  NOT_AUTHENTICATED = 4003,
  AUTHENTICATION_FAILED = 4004,
  ALREADY_AUTHENTICATED = 4005,
  INVALID_SEQ = 4007,
  RATE_LIMITED = 4008,
  SESSION_TIMEOUT = 4009,
  INVALID_SHARD = 4010,
  SHARDING_REQUIRED = 4011,
  INVALID_VERSION = 4012,
  INVALID_INTENT = 4013,
  DISALLOWED_INTENT = 4014,
}

const RESUMABLE_CLOSE_CODES: ReadonlySet<number> = new Set([
  CloseCode.UNKNOWN_ERROR,
  CloseCode.DECODE_ERROR,
  CloseCode.INVALID_SEQ,
  CloseCode.RATE_LIMITED,
  CloseCode.SESSION_TIMEOUT,
]);

const FATAL_CLOSE_CODES: ReadonlySet<number> = new Set([
  CloseCode.NOT_AUTHENTICATED,
  CloseCode.AUTHENTICATION_FAILED,
  CloseCode.ALREADY_AUTHENTICATED,
  CloseCode.INVALID_SHARD,
  CloseCode.SHARDING_REQUIRED,
  CloseCode.INVALID_VERSION,
  CloseCode.INVALID_INTENT,
  CloseCode.DISALLOWED_INTENT,
]);

/**
 * Whether the session survives a close with this code.
 * Transport-level codes (below 4000) keep the session, except a normal
 * closure or going-away, which the server uses to end it.
 */
export function canResumeAfterClose(code: number): boolean {
  if (RESUMABLE_CLOSE_CODES.has(code)) {
    return true;
  }
  return code < 4000 && code !== CloseCode.NORMAL_CLOSURE && code !== CloseCode.GOING_AWAY;
}

/** Close codes that no amount of reconnecting will fix. */
export function isFatalCloseCode(code: number): boolean {
  return FATAL_CLOSE_CODES.has(code);
}

/** Human readable name for logs, e.g. `AUTHENTICATION_FAILED`. */
export function closeCodeName(code: number): string {
  return CloseCode[code] ?? `UNKNOWN_${code}`;
}
