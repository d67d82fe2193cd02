import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Logger } from './logger';

const LINE = /^\[\+\] HostLink: \d{2}\/\d{2}\/\d{4} \d{2}:\d{2}:\d{2} - (\w+): (.*)$/;

// chalk may add colour codes depending on the terminal
function strip(line: string): string {
    return line.replace(/\u001b\[\d+m/g, '');
}

function parse(line: string): [string, string] {
    const match = strip(line).match(LINE);
    if (!match) throw new Error(`unexpected log line: ${line}`);
    return [match[1], match[2]];
}

describe('Logger', () => {
    let lines: string[];
    let tmpDir: string;

    beforeEach(async () => {
        lines = [];
        tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hostlink-log-'));
    });

    afterEach(async () => {
        await fs.remove(tmpDir);
    });

    it('formats level and message', () => {
        const log = new Logger({ write: (line) => lines.push(line) });

        log.info('agent started');
        log.warn('disk nearly full');

        expect(lines.map(parse)).toEqual([
            ['INFO', 'agent started'],
            ['WARNING', 'disk nearly full']
        ]);
    });

    it('collapses repeated messages', () => {
        const log = new Logger({ write: (line) => lines.push(line) });

        log.error('socket closed');
        log.error('socket closed');
        log.error('socket closed');
        log.info('reconnected');

        expect(lines.map(parse)).toEqual([
            ['ERROR', 'socket closed'],
            ['STABILITY', '(Previous message repeated 2 times)'],
            ['INFO', 'reconnected']
        ]);
    });

    it('prints debug only when verbose', () => {
        const log = new Logger({ write: (line) => lines.push(line) });

        log.debug('hidden');
        log.configure({ verbose: true });
        log.debug('shown');

        expect(lines.map(parse)).toEqual([['DEBUG', 'shown']]);
    });

    it('appends to app.log once a log directory is configured', async () => {
        const log = new Logger({ write: (line) => lines.push(line) });
        log.info('console only');

        log.configure({ logDir: tmpDir });
        log.success('to file');
        log.raw('banner');

        const content = await fs.readFile(path.join(tmpDir, 'app.log'), 'utf8');
        const fileLines = content.trimEnd().split('\n');
        expect(fileLines).toHaveLength(2);
        expect(parse(fileLines[0])).toEqual(['SUCCESS', 'to file']);
        expect(fileLines[1]).toBe('banner');
    });
});
