export const ERROR_CODES = {
    // System / Generic
    E_UNKNOWN: { code: 'E_UNKNOWN', message: 'An unknown error occurred.' },
    E_INVALID_CONFIG: { code: 'E_INVALID_CONFIG', message: 'Invalid agent configuration.' },
    E_UNSUPPORTED_PLATFORM: { code: 'E_UNSUPPORTED_PLATFORM', message: 'This operating system is not supported.' },

    // Session / Protocol
    E_CONNECT_FAILED: { code: 'E_CONNECT_FAILED', message: 'Could not connect to the controller.' },
    E_MALFORMED_ACTION: { code: 'E_MALFORMED_ACTION', message: 'Action is missing a required field.' },
    E_KICKED: { code: 'E_KICKED', message: 'Session terminated by the controller.' },

    // Files
    E_NOT_FOUND: { code: 'E_NOT_FOUND', message: 'Path not found.' },
    E_FILE_TOO_LARGE: { code: 'E_FILE_TOO_LARGE', message: 'File exceeds the configured size limit.' },
    E_INVALID_FILEDATA: { code: 'E_INVALID_FILEDATA', message: 'File data is not valid base64.' },
} as const;

export type ErrorCode = keyof typeof ERROR_CODES;
