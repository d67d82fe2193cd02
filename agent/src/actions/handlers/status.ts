import { ActionPayload } from '../../../../shared/types';
import { describeError } from '../../utils/AgentError';
import { ActionHandler } from '../types';

/**
 * Replies with the System Agent's status mapping as-is.
 */
export const handleGetStatus: ActionHandler = async (_payload, { transport, system, log }) => {
    let status: ActionPayload;
    try {
        status = await system.getStatus();
    } catch (err) {
        log.warn(`${transport.peer}: get_status failed: ${describeError(err)}`);
        status = { status: 'failed' };
    }
    transport.sendResponse('status', status);
};
