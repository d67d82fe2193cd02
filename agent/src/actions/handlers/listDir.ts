import { ActionPayload, ListDirStatus } from '../../../../shared/types';
import { PathNotFoundError, describeError } from '../../utils/AgentError';
import { ActionHandler } from '../types';

const DEFAULT_PATH = '/';

export const handleListDir: ActionHandler = async (payload, { transport, system, log }) => {
    const dirPath = payload.path === undefined ? DEFAULT_PATH : payload.path;

    let response: ActionPayload & { status: ListDirStatus };
    try {
        if (typeof dirPath !== 'string') {
            throw new TypeError(`path must be a string, got ${typeof dirPath}`);
        }
        const entries = await system.listDirectory(dirPath);
        response = { status: 'ok', entries };
    } catch (err) {
        if (err instanceof PathNotFoundError) {
            response = { status: 'not_found' };
        } else {
            log.warn(`${transport.peer}: list_dir failed: ${describeError(err)}`);
            response = { status: 'failed' };
        }
    }
    transport.sendResponse('list_dir', response);
};
