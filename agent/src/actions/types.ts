import { ActionPayload } from '../../../shared/types';
import { SystemAgent } from '../system/SystemAgent';
import { TransportPort } from '../transport/TransportPort';
import { LogSink } from '../utils/logger';

export interface ActionSettings {
    /** Used when shell_command carries no usable timeout. */
    shellTimeoutSec: number;
    /** Ceiling for get_file and upload_file. */
    maxFileBytes: number;
}

export interface ActionContext {
    transport: TransportPort;
    system: SystemAgent;
    log: LogSink;
    settings: ActionSettings;
}

/**
 * Handlers send their own response. A rejection ends the session.
 */
export type ActionHandler = (payload: ActionPayload, ctx: ActionContext) => Promise<void>;
