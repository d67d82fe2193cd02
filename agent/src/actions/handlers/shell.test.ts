import { describe, expect, it } from 'vitest';
import { MemoryTransport, createContext } from '../../test-helpers';
import { MalformedActionError } from '../../utils/AgentError';
import { TIMEOUT_MESSAGE, handleShellCommand, resolveTimeoutSec } from './shell';

describe.skipIf(process.platform === 'win32')('shell_command', () => {
    it('returns stdout, stderr and the exit code', async () => {
        const transport = new MemoryTransport();

        await handleShellCommand({ command: 'echo out; echo err 1>&2; exit 3' }, createContext(transport));

        expect(transport.responses).toEqual([
            { type: 'shell_result', payload: { status: 'ok', stdout: 'out\n', stderr: 'err\n', exitcode: 3 } }
        ]);
    });

    it('runs through the shell', async () => {
        const transport = new MemoryTransport();

        await handleShellCommand({ command: 'printf "%s-%s" a b | tr a-z A-Z' }, createContext(transport));

        expect(transport.responses[0].payload).toEqual({ status: 'ok', stdout: 'A-B', stderr: '', exitcode: 0 });
    });

    it('reports a timeout when the command outlives its deadline', async () => {
        const transport = new MemoryTransport();
        const started = Date.now();

        await handleShellCommand({ command: 'sleep 10', timeout: 0.5 }, createContext(transport));

        expect(Date.now() - started).toBeLessThan(5000);
        expect(transport.responses).toEqual([
            { type: 'shell_result', payload: { status: 'timeout', stderr: TIMEOUT_MESSAGE, exitcode: -1 } }
        ]);
    });

    it('honours timeouts longer than the timer limit', async () => {
        const transport = new MemoryTransport();

        await handleShellCommand({ command: 'sleep 1; echo done', timeout: 30 * 24 * 3600 }, createContext(transport));

        expect(transport.responses).toEqual([
            { type: 'shell_result', payload: { status: 'ok', stdout: 'done\n', stderr: '', exitcode: 0 } }
        ]);
    });

    it('uses the configured default timeout', async () => {
        const transport = new MemoryTransport();
        const ctx = createContext(transport, { settings: { shellTimeoutSec: 0.3, maxFileBytes: 1024 } });

        await handleShellCommand({ command: 'sleep 10' }, ctx);

        expect(transport.responses[0].payload).toMatchObject({ status: 'timeout', exitcode: -1 });
    });

    it('sends failed then raises when command is missing', async () => {
        const transport = new MemoryTransport();

        await expect(handleShellCommand({}, createContext(transport))).rejects.toBeInstanceOf(MalformedActionError);
        expect(transport.responses).toEqual([{ type: 'shell_response', payload: { status: 'failed' } }]);
    });

    it('treats an empty command as missing', async () => {
        const transport = new MemoryTransport();

        await expect(handleShellCommand({ command: '' }, createContext(transport))).rejects.toThrow(
            "shell_command: 'command' missing from controller request"
        );
    });
});

describe('resolveTimeoutSec', () => {
    it('accepts positive numbers and numeric strings', () => {
        expect(resolveTimeoutSec(12, 5)).toBe(12);
        expect(resolveTimeoutSec(0.25, 5)).toBe(0.25);
        expect(resolveTimeoutSec('30', 5)).toBe(30);
    });

    it('falls back for anything else', () => {
        expect(resolveTimeoutSec(undefined, 5)).toBe(5);
        expect(resolveTimeoutSec(0, 5)).toBe(5);
        expect(resolveTimeoutSec(-1, 5)).toBe(5);
        expect(resolveTimeoutSec('soon', 5)).toBe(5);
        expect(resolveTimeoutSec('', 5)).toBe(5);
        expect(resolveTimeoutSec(Number.POSITIVE_INFINITY, 5)).toBe(5);
        expect(resolveTimeoutSec({ seconds: 3 }, 5)).toBe(5);
    });
});
