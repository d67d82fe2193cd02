import { ERROR_CODES, ErrorCode } from '../../../shared/errorCodes';

export class AgentError extends Error {
    public readonly errorCode: ErrorCode;
    public readonly isOperational: boolean;
    public readonly details?: Record<string, unknown>;

    constructor(errorCode: ErrorCode, message?: string, isOperational = true, details?: Record<string, unknown>) {
        super(message ?? ERROR_CODES[errorCode].message);
        this.name = new.target.name;
        this.errorCode = errorCode;
        this.isOperational = isOperational;
        this.details = details;

        Object.setPrototypeOf(this, new.target.prototype);
        Error.captureStackTrace(this);
    }
}

/**
 * The controller sent a known command without a field it requires.
 * Terminates the session.
 */
export class MalformedActionError extends AgentError {
    public readonly command: string;
    public readonly field: string;

    constructor(command: string, field: string) {
        super('E_MALFORMED_ACTION', `${command}: '${field}' missing from controller request`, false, { command, field });
        this.command = command;
        this.field = field;
    }
}

/**
 * Raised when the controller kicks this agent. Not a failure: callers use it to
 * tell a deliberate stop apart from something breaking.
 */
export class ConnectionKickedError extends AgentError {
    public readonly reason: string;

    constructor(reason: string) {
        super('E_KICKED', `Kicked by controller: ${reason}`, true, { reason });
        this.reason = reason;
    }
}

export class PathNotFoundError extends AgentError {
    public readonly path: string;

    constructor(path: string) {
        super('E_NOT_FOUND', `Path not found: ${path}`, true, { path });
        this.path = path;
    }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
