import { ActionHandler } from '../types';

export const handlePing: ActionHandler = async (_payload, { transport }) => {
    transport.sendResponse('pong', {});
};
