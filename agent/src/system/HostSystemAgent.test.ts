import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HostCapabilities } from '../../../shared/types';
import { AGENT_VERSION } from '../config';
import { AgentError, PathNotFoundError } from '../utils/AgentError';
import { HostSystemAgent, createSystemAgent } from './HostSystemAgent';

vi.mock('systeminformation', () => ({
    default: {
        cpu: vi.fn(async () => ({ manufacturer: 'Acme', brand: 'Test CPU', cores: 8 })),
        currentLoad: vi.fn(async () => ({ currentLoad: 12.345 })),
        mem: vi.fn(async () => ({ total: 16000, used: 6000, free: 10000 })),
        fsSize: vi.fn(async () => [
            { fs: '/dev/sda1', type: 'ext4', size: 500, used: 120, available: 380, use: 24, mount: '/' }
        ])
    }
}));

const CAPS: HostCapabilities = { shell: '/bin/sh', git: true, docker: false };

describe('HostSystemAgent', () => {
    describe('getStatus', () => {
        it('reports cpu, memory and disks from systeminformation', async () => {
            const agent = new HostSystemAgent('linux', async () => CAPS);

            const status = await agent.getStatus();

            expect(status).toMatchObject({
                hostname: os.hostname(),
                platform: 'linux',
                arch: os.arch(),
                cpu: { model: 'Acme Test CPU', cores: 8, load: 12.3 },
                memory: { total: 16000, used: 6000, free: 10000 },
                disks: [{ mount: '/', size: 500, used: 120 }],
                capabilities: CAPS,
                agentVersion: AGENT_VERSION
            });
        });

        it('detects capabilities once', async () => {
            const detect = vi.fn(async () => CAPS);
            const agent = new HostSystemAgent('linux', detect);

            await agent.getStatus();
            await agent.getStatus();

            expect(detect).toHaveBeenCalledTimes(1);
            expect(detect).toHaveBeenCalledWith('linux');
        });
    });

    describe('listDirectory', () => {
        let tmpDir: string;

        beforeEach(async () => {
            tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hostlink-list-'));
        });

        afterEach(async () => {
            await fs.remove(tmpDir);
        });

        it('lists entries sorted by name with type and size', async () => {
            await fs.writeFile(path.join(tmpDir, 'b.txt'), 'four');
            await fs.mkdir(path.join(tmpDir, 'a-dir'));
            const agent = new HostSystemAgent('linux', async () => CAPS);

            const entries = await agent.listDirectory(tmpDir);

            expect(entries.map((e) => [e.name, e.type])).toEqual([
                ['a-dir', 'directory'],
                ['b.txt', 'file']
            ]);
            expect(entries[1].size).toBe(4);
            expect(typeof entries[1].modified).toBe('number');
        });

        it.skipIf(process.platform === 'win32')('reports symlinks without following them', async () => {
            await fs.symlink('/does/not/exist', path.join(tmpDir, 'dangling'));
            const agent = new HostSystemAgent('linux', async () => CAPS);

            const entries = await agent.listDirectory(tmpDir);

            expect(entries.map((e) => [e.name, e.type])).toEqual([['dangling', 'symlink']]);
        });

        it('rejects with PathNotFoundError for a missing directory', async () => {
            const agent = new HostSystemAgent('linux', async () => CAPS);
            const missing = path.join(tmpDir, 'nope');

            await expect(agent.listDirectory(missing)).rejects.toBeInstanceOf(PathNotFoundError);
        });

        it('rejects with the filesystem error when the path is a file', async () => {
            const file = path.join(tmpDir, 'plain.txt');
            await fs.writeFile(file, 'x');
            const agent = new HostSystemAgent('linux', async () => CAPS);

            const failure = await agent.listDirectory(file).catch((err: unknown) => err);

            expect(failure).not.toBeInstanceOf(PathNotFoundError);
            expect(failure).toMatchObject({ code: 'ENOTDIR' });
        });
    });
});

describe('createSystemAgent', () => {
    it('supports linux, windows and macOS', () => {
        for (const platform of ['linux', 'win32', 'darwin'] as const) {
            expect(createSystemAgent(platform)).toBeInstanceOf(HostSystemAgent);
        }
    });

    it('refuses other platforms', () => {
        const attempt = () => createSystemAgent('aix');

        expect(attempt).toThrow(AgentError);
        expect(attempt).toThrow('Unsupported OS: aix');
    });
});
