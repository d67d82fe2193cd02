import { Command, CommanderError } from 'commander';
import os from 'os';
import path from 'path';
import { AgentError } from './utils/AgentError';

// ──────────────────────────────────────────────
// Constants
// ──────────────────────────────────────────────

export const AGENT_VERSION = '1.0.0';
export const DEFAULT_SHELL_TIMEOUT_SEC = 5;
export const DEFAULT_MAX_FILE_BYTES = 64 * 1024 * 1024;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;

export interface AgentConfig {
    controllerUrl: string;
    agentId: string;
    shellTimeoutSec: number;
    maxFileBytes: number;
    connectTimeoutMs: number;
    logDir: string;
    verbose: boolean;
}

export type AgentEnv = Record<string, string | undefined>;

type CliOptions = {
    controllerUrl?: string;
    agentId?: string;
    shellTimeout?: string;
    maxFileSize?: string;
    connectTimeout?: string;
    logDir?: string;
    verbose?: boolean;
};

function buildProgram(): Command {
    return new Command()
        .name('hostlink-agent')
        .description('HostLink Agent: executes controller actions on this machine')
        .version(AGENT_VERSION)
        .option('--controller-url <url>', 'URL of the controller (env HOSTLINK_CONTROLLER_URL)')
        .option('--agent-id <id>', 'Identifier sent in the handshake (env HOSTLINK_AGENT_ID, default: hostname)')
        .option('--shell-timeout <seconds>', `Default shell_command timeout (env HOSTLINK_SHELL_TIMEOUT, default: ${DEFAULT_SHELL_TIMEOUT_SEC})`)
        .option('--max-file-size <bytes>', `Largest file get_file/upload_file will move (env HOSTLINK_MAX_FILE_SIZE, default: ${DEFAULT_MAX_FILE_BYTES})`)
        .option('--connect-timeout <ms>', `Connection timeout (env HOSTLINK_CONNECT_TIMEOUT, default: ${DEFAULT_CONNECT_TIMEOUT_MS})`)
        .option('--log-dir <path>', 'Directory for app.log (env HOSTLINK_LOG_DIR, default: ./logs)')
        .option('--verbose', 'Log debug messages (env HOSTLINK_VERBOSE=true)')
        .exitOverride();
}

function parsePositive(name: string, raw: string | undefined, fallback: number, integer: boolean): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
        throw new AgentError('E_INVALID_CONFIG', `Invalid ${name}: "${raw}". Must be a positive ${integer ? 'integer' : 'number'}.`);
    }
    return value;
}

function validateUrl(raw: string | undefined): string {
    if (!raw) {
        throw new AgentError('E_INVALID_CONFIG', 'Missing controller URL. Pass --controller-url or set HOSTLINK_CONTROLLER_URL.');
    }
    try {
        new URL(raw);
    } catch {
        throw new AgentError('E_INVALID_CONFIG', `Invalid controller URL: "${raw}". Expected a URL like http://192.168.1.10:3001`);
    }
    return raw;
}

/**
 * Resolves the agent configuration: command-line flags win over environment
 * variables, which win over defaults.
 *
 * Help and version requests surface as a CommanderError with exit code 0.
 */
export function loadConfig(argv: string[], env: AgentEnv = process.env): AgentConfig {
    const program = buildProgram();
    try {
        program.parse(argv, { from: 'user' });
    } catch (err) {
        if (err instanceof CommanderError && err.exitCode === 0) throw err;
        const message = err instanceof Error ? err.message : String(err);
        throw new AgentError('E_INVALID_CONFIG', message);
    }
    const opts = program.opts<CliOptions>();

    return {
        controllerUrl: validateUrl(opts.controllerUrl ?? env.HOSTLINK_CONTROLLER_URL),
        agentId: opts.agentId ?? env.HOSTLINK_AGENT_ID ?? os.hostname(),
        shellTimeoutSec: parsePositive('shell timeout', opts.shellTimeout ?? env.HOSTLINK_SHELL_TIMEOUT, DEFAULT_SHELL_TIMEOUT_SEC, false),
        maxFileBytes: parsePositive('max file size', opts.maxFileSize ?? env.HOSTLINK_MAX_FILE_SIZE, DEFAULT_MAX_FILE_BYTES, true),
        connectTimeoutMs: parsePositive('connect timeout', opts.connectTimeout ?? env.HOSTLINK_CONNECT_TIMEOUT, DEFAULT_CONNECT_TIMEOUT_MS, true),
        logDir: path.resolve(opts.logDir ?? env.HOSTLINK_LOG_DIR ?? './logs'),
        verbose: opts.verbose ?? env.HOSTLINK_VERBOSE === 'true'
    };
}
