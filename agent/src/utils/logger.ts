import chalk from 'chalk';
import fs from 'fs-extra';
import path from 'path';

const LOG_FILE = 'app.log';
const MAX_LOG_SIZE = 10 * 1024 * 1024; // 10MB
const REPEAT_FLUSH_MS = 2000;

/**
 * The logging surface components depend on. Tests hand in a recorder.
 */
export interface LogSink {
    info(message: string): void;
    success(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    debug(message: string): void;
}

export interface LoggerOptions {
    /** Directory for app.log. Null keeps logging on the console only. */
    logDir?: string | null;
    verbose?: boolean;
    /** Console writer, replaceable for tests. */
    write?: (line: string) => void;
}

export class Logger implements LogSink {
    private lastMessage: string = '';
    private repeatCount: number = 0;
    private throttleTimeout: NodeJS.Timeout | null = null;
    private logFile: string | null = null;
    private verbose: boolean = false;
    private write: (line: string) => void = (line) => console.log(line);

    constructor(options: LoggerOptions = {}) {
        this.configure(options);
    }

    configure(options: LoggerOptions): void {
        if (options.logDir !== undefined) {
            if (options.logDir === null) {
                this.logFile = null;
            } else {
                fs.ensureDirSync(options.logDir);
                this.logFile = path.join(options.logDir, LOG_FILE);
            }
        }
        if (options.verbose !== undefined) this.verbose = options.verbose;
        if (options.write) this.write = options.write;
    }

    private getTimestamp() {
        const now = new Date();
        const date = now.toLocaleDateString('en-GB');
        const time = now.toLocaleTimeString('en-GB', { hour12: false });
        return `${date} ${time}`;
    }

    private format(level: string, message: string) {
        return `[+] HostLink: ${this.getTimestamp()} - ${level}: ${message}`;
    }

    private writeToFile(line: string) {
        if (!this.logFile) return;
        try {
            // Rotation
            if (fs.existsSync(this.logFile)) {
                const stats = fs.statSync(this.logFile);
                if (stats.size > MAX_LOG_SIZE) {
                    fs.moveSync(this.logFile, path.join(path.dirname(this.logFile), `app-${Date.now()}.log`));
                }
            }
            fs.appendFileSync(this.logFile, line + '\n');
        } catch (e) {
            console.error('FAILED TO WRITE TO LOG FILE:', e);
        }
    }

    private flushRepeats() {
        const statusMsg = `(Previous message repeated ${this.repeatCount} times)`;
        this.write(chalk.gray(this.format('STABILITY', statusMsg)));
        this.writeToFile(this.format('STABILITY', statusMsg));
        this.repeatCount = 0;
    }

    private logThrottled(level: string, message: string, colorFn: (s: string) => string) {
        if (message === this.lastMessage) {
            this.repeatCount++;
            if (this.throttleTimeout) clearTimeout(this.throttleTimeout);

            this.throttleTimeout = setTimeout(() => {
                this.throttleTimeout = null;
                if (this.repeatCount > 0) {
                    this.flushRepeats();
                    this.lastMessage = '';
                }
            }, REPEAT_FLUSH_MS);
            this.throttleTimeout.unref();
            return;
        }

        // A new message ends the current run of repeats
        if (this.repeatCount > 0) {
            this.flushRepeats();
        }

        this.lastMessage = message;
        const formatted = this.format(level, message);
        this.write(colorFn(formatted));
        this.writeToFile(formatted);
    }

    info(message: string) {
        this.logThrottled('INFO', message, chalk.white);
    }

    success(message: string) {
        this.logThrottled('SUCCESS', message, chalk.green);
    }

    warn(message: string) {
        this.logThrottled('WARNING', message, chalk.yellow);
    }

    error(message: string) {
        this.logThrottled('ERROR', message, chalk.red);
    }

    debug(message: string) {
        if (this.verbose) {
            this.logThrottled('DEBUG', message, chalk.gray);
        }
    }

    raw(message: string) {
        this.write(message);
        this.writeToFile(message);
    }
}

export const logger = new Logger();
