import { Action, ActionCommand, isActionCommand } from '../../../shared/types';
import { handleGetFile, handleUploadFile } from './handlers/files';
import { handleKick } from './handlers/kick';
import { handleListDir } from './handlers/listDir';
import { handlePing } from './handlers/ping';
import { handleShellCommand } from './handlers/shell';
import { handleGetStatus } from './handlers/status';
import { ActionContext, ActionHandler } from './types';

export const ACTION_HANDLERS: Record<ActionCommand, ActionHandler> = {
    ping: handlePing,
    get_status: handleGetStatus,
    list_dir: handleListDir,
    shell_command: handleShellCommand,
    get_file: handleGetFile,
    upload_file: handleUploadFile,
    kick: handleKick
};

/**
 * ActionRouter
 *
 * Pulls one action at a time from the transport and hands it to its handler.
 * An action is fully answered before the next one is received.
 *
 * The loop ends when:
 *   - the transport reports it is no longer connected (run() resolves)
 *   - a handler raises (malformed request, or the kick signal); the error
 *     propagates unchanged
 */
export class ActionRouter {
    private handled = 0;

    constructor(private readonly ctx: ActionContext) {}

    get actionsHandled(): number {
        return this.handled;
    }

    async run(): Promise<number> {
        const { transport, log } = this.ctx;

        while (true) {
            if (!transport.connected) {
                log.error(`${transport.peer}: connection closed during action loop`);
                return this.handled;
            }

            const action = await transport.receiveAction();
            // Closed while waiting; the connected check above ends the loop
            if (!action) continue;

            log.debug(`${transport.peer}: received command ${action.command}`);
            await this.dispatch(action);
            this.handled++;
        }
    }

    async dispatch(action: Action): Promise<void> {
        if (!isActionCommand(action.command)) {
            this.ctx.transport.sendResponse('invalid_action', {});
            return;
        }
        await ACTION_HANDLERS[action.command](action.payload, this.ctx);
    }
}
