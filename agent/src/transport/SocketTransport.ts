import { io, Socket } from 'socket.io-client';
import {
    Action,
    ActionPayload,
    ActionResponse,
    PROTOCOL_VERSION,
    ResponseType,
    WIRE_EVENTS
} from '../../../shared/types';
import { AgentError } from '../utils/AgentError';
import { LogSink, logger } from '../utils/logger';
import { TransportPort } from './TransportPort';

export interface ControllerToAgentEvents {
    [WIRE_EVENTS.ACTION]: (frame: unknown) => void;
}

export interface AgentToControllerEvents {
    [WIRE_EVENTS.RESPONSE]: (frame: ActionResponse) => void;
}

export type AgentSocket = Socket<ControllerToAgentEvents, AgentToControllerEvents>;

export interface SocketTransportOptions {
    agentId: string;
    agentVersion: string;
    connectTimeoutMs: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turns an inbound `action` frame into an Action. Frames without a string
 * command are not actions and yield null; a missing or non-object payload
 * becomes `{}`.
 */
export function parseActionFrame(frame: unknown): Action | null {
    if (!isRecord(frame) || typeof frame.command !== 'string') return null;
    return {
        command: frame.command,
        payload: isRecord(frame.payload) ? frame.payload : {}
    };
}

/**
 * Transport Port over a Socket.IO client connection.
 *
 * Inbound actions are buffered in arrival order until the router asks for
 * them. Reconnection is left off: a dropped connection ends the session.
 */
export class SocketTransport implements TransportPort {
    private readonly inbox: Action[] = [];
    private readonly waiters: ((action: Action | null) => void)[] = [];

    constructor(
        private readonly socket: AgentSocket,
        public readonly peer: string,
        private readonly log: LogSink = logger
    ) {
        socket.on(WIRE_EVENTS.ACTION, (frame) => this.onAction(frame));
        socket.on('disconnect', (reason) => this.onDisconnect(reason));
    }

    static connect(url: string, options: SocketTransportOptions, log: LogSink = logger): Promise<SocketTransport> {
        const socket: AgentSocket = io(url, {
            auth: {
                agentId: options.agentId,
                agentVersion: options.agentVersion,
                protocolVersion: PROTOCOL_VERSION
            },
            reconnection: false,
            timeout: options.connectTimeoutMs,
            transports: ['websocket', 'polling']
        });
        const transport = new SocketTransport(socket, url, log);

        return new Promise((resolve, reject) => {
            const onConnect = () => {
                socket.off('connect_error', onError);
                log.success(`${url}: connected (socket ${socket.id})`);
                resolve(transport);
            };
            const onError = (err: Error) => {
                socket.off('connect', onConnect);
                socket.disconnect();
                reject(new AgentError('E_CONNECT_FAILED', `Connection to ${url} failed: ${err.message}`));
            };
            socket.once('connect', onConnect);
            socket.once('connect_error', onError);
        });
    }

    get connected(): boolean {
        return this.socket.connected;
    }

    receiveAction(): Promise<Action | null> {
        const next = this.inbox.shift();
        if (next) return Promise.resolve(next);
        if (!this.socket.connected) return Promise.resolve(null);
        return new Promise((resolve) => {
            this.waiters.push(resolve);
        });
    }

    sendResponse(type: ResponseType, payload: ActionPayload): void {
        if (!this.socket.connected) {
            this.log.warn(`${this.peer}: dropping '${type}' response, connection is closed`);
            return;
        }
        this.socket.emit(WIRE_EVENTS.RESPONSE, { type, payload });
    }

    close(): void {
        if (this.socket.connected) {
            this.socket.disconnect();
        }
        this.releaseWaiters();
    }

    private onAction(frame: unknown): void {
        const action = parseActionFrame(frame);
        if (!action) {
            this.log.warn(`${this.peer}: ignoring malformed action frame`);
            return;
        }
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter(action);
        } else {
            this.inbox.push(action);
        }
    }

    private onDisconnect(reason: string): void {
        this.log.warn(`${this.peer}: disconnected (${reason})`);
        this.releaseWaiters();
    }

    private releaseWaiters(): void {
        for (const waiter of this.waiters.splice(0)) {
            waiter(null);
        }
    }
}
