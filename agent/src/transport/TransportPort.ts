import { Action, ActionPayload, ResponseType } from '../../../shared/types';

/**
 * The connection to the controller as the action loop sees it.
 */
export interface TransportPort {
    /** Liveness of the session. Owned by the transport, only read by the router. */
    readonly connected: boolean;
    /** Controller address, used as the log prefix. */
    readonly peer: string;
    /**
     * Waits for the next action. Resolves null when the connection closes
     * before one arrives.
     */
    receiveAction(): Promise<Action | null>;
    sendResponse(type: ResponseType, payload: ActionPayload): void;
    close(): void;
}
