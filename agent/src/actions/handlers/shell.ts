import { ShellResultPayload } from '../../../../shared/types';
import { runShellCommand } from '../../exec/runShellCommand';
import { MalformedActionError, describeError } from '../../utils/AgentError';
import { ActionHandler } from '../types';

export const TIMEOUT_MESSAGE = 'Command timed out';

/**
 * Seconds to allow the command. Numbers and numeric strings are accepted;
 * anything that is not a positive finite value falls back to the default.
 */
export function resolveTimeoutSec(raw: unknown, fallback: number): number {
    const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
    if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
        return value;
    }
    return fallback;
}

export const handleShellCommand: ActionHandler = async (payload, { transport, log, settings }) => {
    const command = payload.command;
    if (typeof command !== 'string' || command === '') {
        // Controllers expect the malformed-request reply on this channel
        transport.sendResponse('shell_response', { status: 'failed' });
        throw new MalformedActionError('shell_command', 'command');
    }
    const timeoutSec = resolveTimeoutSec(payload.timeout, settings.shellTimeoutSec);

    log.debug(`${transport.peer}: shell_command (timeout ${timeoutSec}s): ${command}`);
    let result: ShellResultPayload;
    try {
        const run = await runShellCommand(command, timeoutSec * 1000);
        result = run.timedOut
            ? { status: 'timeout', stderr: TIMEOUT_MESSAGE, exitcode: -1 }
            : { status: 'ok', stdout: run.stdout, stderr: run.stderr, exitcode: run.exitCode };
    } catch (err) {
        log.warn(`${transport.peer}: shell_command failed: ${describeError(err)}`);
        result = { status: 'failed' };
    }
    transport.sendResponse('shell_result', result);
};
