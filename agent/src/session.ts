import { ActionRouter } from './actions/ActionRouter';
import { ActionSettings } from './actions/types';
import { SystemAgent } from './system/SystemAgent';
import { TransportPort } from './transport/TransportPort';
import { ConnectionKickedError } from './utils/AgentError';
import { LogSink, logger } from './utils/logger';

export type SessionOutcome =
    | { reason: 'disconnected'; actionsHandled: number }
    | { reason: 'kicked'; kickReason: string; actionsHandled: number };

export interface SessionOptions {
    settings: ActionSettings;
    log?: LogSink;
}

/**
 * Runs the action loop for one connection and closes the connection when the
 * loop ends, however it ends. Failures other than a kick are rethrown.
 */
export async function runSession(
    transport: TransportPort,
    system: SystemAgent,
    options: SessionOptions
): Promise<SessionOutcome> {
    const log = options.log ?? logger;
    const router = new ActionRouter({ transport, system, log, settings: options.settings });

    try {
        const actionsHandled = await router.run();
        return { reason: 'disconnected', actionsHandled };
    } catch (err) {
        if (err instanceof ConnectionKickedError) {
            return { reason: 'kicked', kickReason: err.reason, actionsHandled: router.actionsHandled };
        }
        throw err;
    } finally {
        transport.close();
    }
}
