#!/usr/bin/env node
/**
 * HostLink Agent
 *
 * Long-lived process that connects to a controller and executes the actions
 * it sends: status reports, directory listings, shell commands and file
 * transfers. Every action gets exactly one response.
 *
 * Usage:
 *   hostlink-agent --controller-url http://controller:3001 [--agent-id <id>]
 *
 * Exit codes:
 *   0  connection closed, or kicked by the controller
 *   1  configuration error, connection failure, or malformed request
 */

import { CommanderError } from 'commander';
import os from 'os';
import { AgentConfig, AGENT_VERSION, loadConfig } from './config';
import { runSession } from './session';
import { createSystemAgent } from './system/HostSystemAgent';
import { SocketTransport } from './transport/SocketTransport';
import { AgentError, describeError } from './utils/AgentError';
import { logger } from './utils/logger';

function printBanner(config: AgentConfig): void {
    logger.raw('═══════════════════════════════════════════');
    logger.raw(`  HostLink Agent v${AGENT_VERSION}`);
    logger.raw('═══════════════════════════════════════════');
    logger.raw(`  Host:          ${os.hostname()}`);
    logger.raw(`  Platform:      ${os.platform()} ${os.arch()}`);
    logger.raw(`  Agent ID:      ${config.agentId}`);
    logger.raw(`  Controller:    ${config.controllerUrl}`);
    logger.raw(`  Shell timeout: ${config.shellTimeoutSec}s`);
    logger.raw(`  Max file size: ${config.maxFileBytes} bytes`);
    logger.raw('═══════════════════════════════════════════');
}

async function main(): Promise<number> {
    let config: AgentConfig;
    try {
        config = loadConfig(process.argv.slice(2));
    } catch (err) {
        if (err instanceof CommanderError) return err.exitCode;
        logger.error(describeError(err));
        return 1;
    }

    logger.configure({ logDir: config.logDir, verbose: config.verbose });
    printBanner(config);

    const system = createSystemAgent();

    logger.info(`Connecting to controller: ${config.controllerUrl}`);
    const transport = await SocketTransport.connect(config.controllerUrl, {
        agentId: config.agentId,
        agentVersion: AGENT_VERSION,
        connectTimeoutMs: config.connectTimeoutMs
    });

    const shutdown = (signal: string) => {
        logger.warn(`Received ${signal}, closing connection...`);
        transport.close();
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    const outcome = await runSession(transport, system, {
        settings: {
            shellTimeoutSec: config.shellTimeoutSec,
            maxFileBytes: config.maxFileBytes
        }
    });

    if (outcome.reason === 'kicked') {
        logger.warn(`Session ended by controller: ${outcome.kickReason} (${outcome.actionsHandled} actions handled)`);
    } else {
        logger.info(`Session ended: connection closed (${outcome.actionsHandled} actions handled)`);
    }
    return 0;
}

process.on('unhandledRejection', (reason: unknown) => {
    logger.error(`Unhandled rejection: ${describeError(reason)}`);
});

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        if (err instanceof AgentError && err.isOperational) {
            logger.warn(`[${err.errorCode}] ${err.message}`);
        } else if (err instanceof AgentError) {
            logger.error(`[${err.errorCode}] ${err.message} | ${err.stack || ''}`);
        } else {
            logger.error(`Agent crashed: ${err instanceof Error ? err.stack || err.message : String(err)}`);
        }
        process.exitCode = 1;
    });
