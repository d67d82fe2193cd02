import { Action, ActionPayload, ActionResponse, DirectoryEntry, ResponseType } from '../../shared/types';
import { ActionContext, ActionSettings } from './actions/types';
import { SystemAgent } from './system/SystemAgent';
import { TransportPort } from './transport/TransportPort';
import { PathNotFoundError } from './utils/AgentError';
import { LogSink } from './utils/logger';

/**
 * Transport Port fed from a fixed list of actions. Once the list is drained
 * the "controller" hangs up.
 */
export class MemoryTransport implements TransportPort {
    connected = true;
    closed = false;
    receiveCalls = 0;
    readonly peer = 'test-controller';
    readonly responses: ActionResponse[] = [];
    private readonly queue: Action[];

    constructor(actions: Action[] = []) {
        this.queue = [...actions];
    }

    async receiveAction(): Promise<Action | null> {
        this.receiveCalls++;
        const next = this.queue.shift();
        if (!next) {
            this.connected = false;
            return null;
        }
        return next;
    }

    sendResponse(type: ResponseType, payload: ActionPayload): void {
        this.responses.push({ type, payload });
    }

    close(): void {
        this.closed = true;
        this.connected = false;
    }

    get pending(): number {
        return this.queue.length;
    }
}

export function action(command: string, payload: ActionPayload = {}): Action {
    return { command, payload };
}

export type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

export class RecordingLog implements LogSink {
    readonly entries: { level: LogLevel; message: string }[] = [];

    info(message: string) { this.entries.push({ level: 'info', message }); }
    success(message: string) { this.entries.push({ level: 'success', message }); }
    warn(message: string) { this.entries.push({ level: 'warn', message }); }
    error(message: string) { this.entries.push({ level: 'error', message }); }
    debug(message: string) { this.entries.push({ level: 'debug', message }); }

    messages(level: LogLevel): string[] {
        return this.entries.filter((e) => e.level === level).map((e) => e.message);
    }
}

/**
 * System Agent serving canned directory listings. Paths missing from the map
 * are not found; a path mapped to an Error rejects with it.
 */
export class FakeSystemAgent implements SystemAgent {
    readonly listed: string[] = [];

    constructor(
        private readonly status: Record<string, unknown> | Error = { hostname: 'test-host' },
        private readonly directories: Record<string, DirectoryEntry[] | Error> = {}
    ) {}

    async getStatus(): Promise<Record<string, unknown>> {
        if (this.status instanceof Error) throw this.status;
        return this.status;
    }

    async listDirectory(path: string): Promise<DirectoryEntry[]> {
        this.listed.push(path);
        const listing = this.directories[path];
        if (listing === undefined) throw new PathNotFoundError(path);
        if (listing instanceof Error) throw listing;
        return listing;
    }
}

export const TEST_SETTINGS: ActionSettings = {
    shellTimeoutSec: 5,
    maxFileBytes: 1024
};

export function createContext(
    transport: TransportPort,
    overrides: { system?: SystemAgent; settings?: ActionSettings; log?: RecordingLog } = {}
): ActionContext & { log: RecordingLog } {
    return {
        transport,
        system: overrides.system ?? new FakeSystemAgent(),
        settings: overrides.settings ?? TEST_SETTINGS,
        log: overrides.log ?? new RecordingLog()
    };
}
