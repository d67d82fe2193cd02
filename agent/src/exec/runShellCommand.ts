import { ChildProcess, spawn } from 'child_process';
import os from 'os';
import { resolveShell } from '../system/capabilities';

/** Longest delay setTimeout honours; larger values fire after 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

export interface ShellRunResult {
    timedOut: boolean;
    stdout: string;
    stderr: string;
    /** Exit code, or the negated signal number when the shell died from a signal. */
    exitCode: number;
}

function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
    if (code !== null) return code;
    const entry = signal ? Object.entries(os.constants.signals).find(([name]) => name === signal) : undefined;
    return entry ? -entry[1] : -1;
}

/**
 * Kills the shell together with everything it started. On POSIX the shell
 * leads its own process group; on Windows taskkill walks the tree.
 */
function killProcessTree(child: ChildProcess, platform: NodeJS.Platform): void {
    const pid = child.pid;
    if (pid === undefined) return;

    if (platform === 'win32') {
        spawn('taskkill', ['/pid', String(pid), '/T', '/F'], { stdio: 'ignore', windowsHide: true })
            .on('error', () => child.kill('SIGKILL'));
        return;
    }

    try {
        process.kill(-pid, 'SIGKILL');
    } catch {
        // Group already gone, fall back to the shell itself
        child.kill('SIGKILL');
    }
}

/**
 * Runs a command through the host shell, capturing output. Resolves with
 * `timedOut` once the process tree has been killed at the deadline; rejects
 * when the shell cannot be started.
 */
export function runShellCommand(
    command: string,
    timeoutMs: number,
    platform: NodeJS.Platform = process.platform
): Promise<ShellRunResult> {
    return new Promise((resolve, reject) => {
        const child = spawn(command, {
            shell: resolveShell(platform),
            detached: platform !== 'win32',
            stdio: ['ignore', 'pipe', 'pipe'],
            windowsHide: true
        });

        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let timedOut = false;
        let settled = false;

        child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
        child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

        const timer = setTimeout(() => {
            timedOut = true;
            killProcessTree(child, platform);
        }, Math.min(timeoutMs, MAX_TIMER_MS));

        const finish = (code: number | null, signal: NodeJS.Signals | null) => {
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            resolve({
                timedOut,
                stdout: Buffer.concat(stdout).toString('utf8'),
                stderr: Buffer.concat(stderr).toString('utf8'),
                exitCode: timedOut ? -1 : exitCodeOf(code, signal)
            });
        };

        child.once('error', (err) => {
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            reject(err);
        });

        // After a timeout the output is discarded, so do not wait for pipes
        // that an escaped grandchild may still hold open.
        child.once('exit', (code, signal) => {
            if (!timedOut) return;
            child.stdout?.destroy();
            child.stderr?.destroy();
            finish(code, signal);
        });

        child.once('close', finish);
    });
}
