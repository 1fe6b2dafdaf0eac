export type ErrorKind =
  | 'AUTHENTICATION_FAILED'
  | 'NICKNAME_COLLISION'
  | 'PORT_EXHAUSTED'
  | 'PROCESS_LAUNCH_FAILED'
  | 'TRANSPORT_DISCONNECTED'
  | 'PROTOCOL_VIOLATION';

const USER_MESSAGES: Record<ErrorKind, string> = {
  AUTHENTICATION_FAILED: 'Wrong verification code, please check it and try again',
  NICKNAME_COLLISION: 'Nickname already taken, a suffixed one was assigned',
  PORT_EXHAUSTED: 'No free stream port is available on the host, please try again later',
  PROCESS_LAUNCH_FAILED: 'The stream relay could not be started',
  TRANSPORT_DISCONNECTED: 'Lost the connection to the server',
  PROTOCOL_VIOLATION: 'Malformed or unexpected message',
};

export function userMessage(kind: ErrorKind): string {
  return USER_MESSAGES[kind];
}

export class SessionError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, detail?: string, options?: { cause?: unknown }) {
    super(detail ?? userMessage(kind), options);
    this.name = 'SessionError';
    this.kind = kind;
  }

  /** The text that may be shown to a user; `message` may hold internal detail. */
  get userMessage(): string {
    return userMessage(this.kind);
  }
}

export type SupervisorErrorCode = 'ALREADY_RUNNING' | 'NOT_FOUND' | 'LAUNCH_FAILED';

export class SupervisorError extends Error {
  readonly code: SupervisorErrorCode;
  readonly processName: string;

  constructor(code: SupervisorErrorCode, processName: string, options?: { cause?: unknown }) {
    super(`${code}: ${processName}`, options);
    this.name = 'SupervisorError';
    this.code = code;
    this.processName = processName;
  }
}

export function isSupervisorError(error: unknown, code?: SupervisorErrorCode): error is SupervisorError {
  return error instanceof SupervisorError && (code === undefined || error.code === code);
}
