import { ConnectionKickedError, MalformedActionError } from '../../utils/AgentError';
import { ActionHandler } from '../types';

/**
 * The controller is ending the session. Never resolves: it either raises the
 * kick signal or, without a reason, a malformed-request failure. Closing the
 * connection is left to whoever runs the router.
 */
export const handleKick: ActionHandler = async (payload, { transport, log }) => {
    if (!('reason' in payload)) {
        throw new MalformedActionError('kick', 'reason');
    }
    const reason = String(payload.reason);
    log.error(`${transport.peer}: kicked by controller: ${reason}`);
    throw new ConnectionKickedError(reason);
};
