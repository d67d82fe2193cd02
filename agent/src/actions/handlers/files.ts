import fs from 'fs-extra';
import { FileSendStatus, FileUploadStatus } from '../../../../shared/types';
import { AgentError, MalformedActionError, describeError, isErrnoException } from '../../utils/AgentError';
import { ActionHandler } from '../types';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/** Number of bytes a validated, whitespace-free base64 string decodes to. */
export function decodedLength(compact: string): number {
    const padding = compact.endsWith('==') ? 2 : compact.endsWith('=') ? 1 : 0;
    return (compact.length / 4) * 3 - padding;
}

/**
 * Strict base64 decoding. Buffer.from() silently skips characters outside
 * the alphabet, so the text is checked first. Input that would decode to
 * more than `maxBytes` is rejected before any buffer is allocated.
 */
export function decodeBase64(text: string, maxBytes = Infinity): Buffer {
    const compact = text.replace(/\s+/g, '');
    if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
        throw new AgentError('E_INVALID_FILEDATA');
    }
    const size = decodedLength(compact);
    if (size > maxBytes) {
        throw new AgentError('E_FILE_TOO_LARGE', `upload is ${size} bytes, limit is ${maxBytes}`);
    }
    return Buffer.from(compact, 'base64');
}

type FileSendPayload = { status: FileSendStatus; filedata?: string };

async function readForTransfer(filePath: unknown, maxBytes: number): Promise<FileSendPayload> {
    if (typeof filePath !== 'string' || filePath === '') {
        return { status: 'not_found' };
    }

    let stats: fs.Stats;
    try {
        stats = await fs.stat(filePath);
    } catch (err) {
        if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
            return { status: 'not_found' };
        }
        throw err;
    }
    if (!stats.isFile()) {
        return { status: 'not_found' };
    }
    if (stats.size > maxBytes) {
        throw new AgentError('E_FILE_TOO_LARGE', `${filePath} is ${stats.size} bytes, limit is ${maxBytes}`);
    }

    const data = await fs.readFile(filePath);
    return { status: 'ok', filedata: data.toString('base64') };
}

/**
 * get_file: sends the whole file base64-encoded.
 */
export const handleGetFile: ActionHandler = async (payload, { transport, log, settings }) => {
    if (!('path' in payload)) {
        transport.sendResponse('file_send', { status: 'failed' });
        throw new MalformedActionError('get_file', 'path');
    }

    let response: FileSendPayload;
    try {
        response = await readForTransfer(payload.path, settings.maxFileBytes);
    } catch (err) {
        log.warn(`${transport.peer}: file_send failed: ${describeError(err)}`);
        response = { status: 'failed' };
    }
    transport.sendResponse('file_send', response);
};

/**
 * upload_file: writes the decoded bytes to a path that must not exist yet.
 */
export const handleUploadFile: ActionHandler = async (payload, { transport, log, settings }) => {
    const { path: target, filedata } = payload;
    if (typeof target !== 'string' || target === '') {
        transport.sendResponse('file_upload', { status: 'failed' });
        throw new MalformedActionError('upload_file', 'path');
    }
    if (typeof filedata !== 'string' || filedata === '') {
        transport.sendResponse('file_upload', { status: 'failed' });
        throw new MalformedActionError('upload_file', 'filedata');
    }

    let status: FileUploadStatus;
    try {
        const bytes = decodeBase64(filedata, settings.maxFileBytes);
        // 'wx' fails with EEXIST instead of overwriting
        await fs.writeFile(target, bytes, { flag: 'wx' });
        status = 'ok';
    } catch (err) {
        if (isErrnoException(err) && err.code === 'EEXIST') {
            status = 'file_exists';
        } else {
            log.warn(`${transport.peer}: file_upload failed: ${describeError(err)}`);
            status = 'failed';
        }
    }
    transport.sendResponse('file_upload', { status });
};
