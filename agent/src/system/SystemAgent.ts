import { DirectoryEntry } from '../../../shared/types';

/**
 * Platform capability provider for status and filesystem queries.
 */
export interface SystemAgent {
    getStatus(): Promise<Record<string, unknown>>;
    /** Rejects with PathNotFoundError when the path does not exist. */
    listDirectory(path: string): Promise<DirectoryEntry[]>;
}
