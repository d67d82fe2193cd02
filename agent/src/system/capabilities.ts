import { exec } from 'child_process';
import util from 'util';
import { HostCapabilities } from '../../../shared/types';

const execAsync = util.promisify(exec);

/**
 * Shell used for shell_command on this platform.
 */
export function resolveShell(platform: NodeJS.Platform = process.platform): string {
    return platform === 'win32' ? (process.env.ComSpec || 'cmd.exe') : '/bin/sh';
}

/**
 * Detects the tooling installed on this host.
 */
export async function getCapabilities(platform: NodeJS.Platform = process.platform): Promise<HostCapabilities> {
    const caps: HostCapabilities = {
        shell: resolveShell(platform),
        git: false,
        docker: false
    };

    // 1. Git
    try {
        await execAsync('git --version');
        caps.git = true;
    } catch {
        caps.git = false;
    }

    // 2. Docker
    try {
        await execAsync('docker --version');
        caps.docker = true;
    } catch {
        caps.docker = false;
    }

    // 3. Python (python3 first, Windows installs usually only have `python`)
    for (const binary of ['python3', 'python']) {
        try {
            const { stdout, stderr } = await execAsync(`${binary} --version`);
            // Python 2 prints its version to stderr
            const match = (stdout || stderr).match(/Python ([^\s]+)/i);
            if (match) {
                caps.python = match[1];
                break;
            }
        } catch {
            // not installed
        }
    }

    return caps;
}
