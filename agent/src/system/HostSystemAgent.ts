import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import si from 'systeminformation';
import { DirectoryEntry, DirectoryEntryType, HostCapabilities, HostStatus } from '../../../shared/types';
import { AGENT_VERSION } from '../config';
import { AgentError, PathNotFoundError, isErrnoException } from '../utils/AgentError';
import { getCapabilities } from './capabilities';
import { SystemAgent } from './SystemAgent';

const SUPPORTED_PLATFORMS: ReadonlySet<NodeJS.Platform> = new Set<NodeJS.Platform>(['linux', 'win32', 'darwin']);

function entryType(stats: fs.Stats): DirectoryEntryType {
    if (stats.isSymbolicLink()) return 'symlink';
    if (stats.isDirectory()) return 'directory';
    if (stats.isFile()) return 'file';
    return 'other';
}

/**
 * System Agent backed by systeminformation and the local filesystem.
 */
export class HostSystemAgent implements SystemAgent {
    private capabilities: HostCapabilities | null = null;

    constructor(
        public readonly platform: NodeJS.Platform,
        private readonly detectCapabilities: (platform: NodeJS.Platform) => Promise<HostCapabilities> = getCapabilities
    ) {}

    async getStatus(): Promise<HostStatus> {
        const [cpu, memory, disks] = await Promise.all([
            this.getCpu(),
            this.getMemory(),
            this.getDisks()
        ]);

        // Installed tools rarely change while the agent runs
        if (!this.capabilities) {
            this.capabilities = await this.detectCapabilities(this.platform);
        }

        return {
            hostname: os.hostname(),
            platform: this.platform,
            release: os.release(),
            arch: os.arch(),
            uptime: os.uptime(),
            cpu,
            memory,
            disks,
            capabilities: this.capabilities,
            agentVersion: AGENT_VERSION
        };
    }

    async listDirectory(dirPath: string): Promise<DirectoryEntry[]> {
        let names: string[];
        try {
            names = await fs.readdir(dirPath);
        } catch (err) {
            if (isErrnoException(err) && err.code === 'ENOENT') {
                throw new PathNotFoundError(dirPath);
            }
            throw err;
        }

        const entries: DirectoryEntry[] = [];
        for (const name of names.sort()) {
            try {
                const stats = await fs.lstat(path.join(dirPath, name));
                entries.push({
                    name,
                    type: entryType(stats),
                    size: stats.size,
                    modified: stats.mtimeMs
                });
            } catch (err) {
                // Removed between readdir and lstat
                if (isErrnoException(err) && err.code === 'ENOENT') continue;
                throw err;
            }
        }
        return entries;
    }

    private async getCpu(): Promise<HostStatus['cpu']> {
        try {
            const [info, load] = await Promise.all([si.cpu(), si.currentLoad()]);
            return {
                model: `${info.manufacturer} ${info.brand}`.trim(),
                cores: info.cores,
                load: Math.round(load.currentLoad * 10) / 10
            };
        } catch {
            return { model: os.cpus()[0]?.model ?? 'unknown', cores: os.cpus().length, load: 0 };
        }
    }

    private async getMemory(): Promise<HostStatus['memory']> {
        try {
            const mem = await si.mem();
            return { total: mem.total, used: mem.used, free: mem.free };
        } catch {
            return { total: os.totalmem(), used: os.totalmem() - os.freemem(), free: os.freemem() };
        }
    }

    private async getDisks(): Promise<HostStatus['disks']> {
        try {
            const disks = await si.fsSize();
            return disks.map((disk) => ({ mount: disk.mount, size: disk.size, used: disk.used }));
        } catch {
            return [];
        }
    }
}

/**
 * Picks the System Agent for the host operating system.
 */
export function createSystemAgent(platform: NodeJS.Platform = process.platform): SystemAgent {
    if (!SUPPORTED_PLATFORMS.has(platform)) {
        throw new AgentError('E_UNSUPPORTED_PLATFORM', `Unsupported OS: ${platform}`, false);
    }
    return new HostSystemAgent(platform);
}
