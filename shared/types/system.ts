export type DirectoryEntryType = 'file' | 'directory' | 'symlink' | 'other';

export interface DirectoryEntry {
    name: string;
    type: DirectoryEntryType;
    size: number; // bytes
    modified: number; // epoch ms
}

export interface HostCapabilities {
    shell: string;
    git: boolean;
    docker: boolean;
    python?: string;
}

export type HostStatus = {
    hostname: string;
    platform: string;
    release: string;
    arch: string;
    uptime: number; // seconds
    cpu: {
        model: string;
        cores: number;
        load: number; // percent, one decimal
    };
    memory: {
        total: number; // bytes
        used: number;
        free: number;
    };
    disks: { mount: string; size: number; used: number }[];
    capabilities: HostCapabilities;
    agentVersion: string;
};
