// --- Controller <-> Agent Wire Types ---

/**
 * Every command the agent understands. Anything else is answered with
 * `invalid_action`.
 */
export const ACTION_COMMANDS = [
    'ping',
    'get_status',
    'list_dir',
    'shell_command',
    'get_file',
    'upload_file',
    'kick'
] as const;

export type ActionCommand = typeof ACTION_COMMANDS[number];

export type ActionPayload = Record<string, unknown>;

export interface Action {
    command: string;
    payload: ActionPayload;
}

export type ResponseType =
    | 'pong'
    | 'status'
    | 'list_dir'
    | 'shell_result'
    | 'shell_response'
    | 'file_send'
    | 'file_upload'
    | 'invalid_action';

export interface ActionResponse {
    type: ResponseType;
    payload: ActionPayload;
}

export type ListDirStatus = 'ok' | 'not_found' | 'failed';
export type ShellStatus = 'ok' | 'timeout' | 'failed';
export type FileSendStatus = 'ok' | 'not_found' | 'failed';
export type FileUploadStatus = 'ok' | 'file_exists' | 'failed';

export type ShellResultPayload = {
    status: ShellStatus;
    stdout?: string;
    stderr?: string;
    exitcode?: number;
};

/** Socket.IO event names used on the agent connection. */
export const WIRE_EVENTS = {
    ACTION: 'action',
    RESPONSE: 'response'
} as const;

export const PROTOCOL_VERSION = '1';

export function isActionCommand(command: string): command is ActionCommand {
    return ACTION_COMMANDS.some((known) => known === command);
}
