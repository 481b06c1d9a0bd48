import chalk from 'chalk';
import fs from 'fs-extra';
import path from 'path';

const DEFAULT_MAX_LOG_SIZE = 50 * 1024 * 1024; // 50MB

export type LogLevel = 'DEBUG' | 'INFO' | 'SUCCESS' | 'WARN' | 'ERROR' | 'ALERT' | 'CRITICAL';

export interface LoggerOptions {
    file?: string;
    maxSize?: number;
    verbose?: boolean;
    quiet?: boolean; // no console output, file only
}

export class Logger {
    private readonly file?: string;
    private readonly maxSize: number;
    private readonly verbose: boolean;
    private readonly quiet: boolean;
    private lastMessage: string = '';
    private repeatCount: number = 0;
    private throttleTimeout: NodeJS.Timeout | null = null;

    constructor(options: LoggerOptions = {}) {
        this.file = options.file;
        this.maxSize = options.maxSize ?? DEFAULT_MAX_LOG_SIZE;
        this.verbose = options.verbose ?? false;
        this.quiet = options.quiet ?? false;

        if (this.file) {
            try {
                fs.ensureDirSync(path.dirname(this.file));
            } catch (e) {
                console.error('FAILED TO CREATE LOG DIRECTORY:', e);
            }
        }
    }

    get logFile(): string | undefined {
        return this.file;
    }

    private format(level: LogLevel, message: string) {
        return `[${new Date().toISOString()}] [${level}] ${message}`;
    }

    private writeToFile(line: string) {
        if (!this.file) return;
        try {
            // Rotation Logic
            if (fs.existsSync(this.file)) {
                const stats = fs.statSync(this.file);
                if (stats.size > this.maxSize) {
                    fs.moveSync(this.file, `${this.file}.old`, { overwrite: true });
                }
            }
            fs.appendFileSync(this.file, line + '\n');
        } catch (e) {
            console.error('FAILED TO WRITE TO LOG FILE:', e);
        }
    }

    private print(line: string) {
        if (!this.quiet) console.log(line);
    }

    private flushRepeats() {
        if (this.repeatCount > 0) {
            const statusMsg = this.format('INFO', `(Previous message repeated ${this.repeatCount} times)`);
            this.print(chalk.gray(statusMsg));
            this.writeToFile(statusMsg);
            this.repeatCount = 0;
        }
    }

    private logThrottled(level: LogLevel, message: string, colorFn: (s: string) => string) {
        const key = `${level}:${message}`;
        if (key === this.lastMessage) {
            this.repeatCount++;
            if (this.throttleTimeout) clearTimeout(this.throttleTimeout);

            this.throttleTimeout = setTimeout(() => {
                this.flushRepeats();
                this.lastMessage = '';
            }, 2000);
            this.throttleTimeout.unref();
            return;
        }

        // A new message ends the repeat run
        this.flushRepeats();

        this.lastMessage = key;
        const formatted = this.format(level, message);
        this.print(colorFn(formatted));
        this.writeToFile(formatted);
    }

    info(message: string) {
        this.logThrottled('INFO', message, chalk.white);
    }

    success(message: string) {
        this.logThrottled('SUCCESS', message, chalk.green);
    }

    warn(message: string) {
        this.logThrottled('WARN', message, chalk.yellow);
    }

    error(message: string) {
        this.logThrottled('ERROR', message, chalk.red);
    }

    alert(message: string) {
        this.logThrottled('ALERT', message, chalk.magenta);
    }

    critical(message: string) {
        this.logThrottled('CRITICAL', message, chalk.bgRed.white);
    }

    debug(message: string) {
        if (this.verbose) {
            this.logThrottled('DEBUG', message, chalk.gray);
        }
    }

    // Verbatim output from the server or an external command
    raw(message: string) {
        this.print(message);
        this.writeToFile(message);
    }

    /** Flushes a pending repeat summary and stops its timer. */
    close() {
        if (this.throttleTimeout) {
            clearTimeout(this.throttleTimeout);
            this.throttleTimeout = null;
        }
        this.flushRepeats();
        this.lastMessage = '';
    }
}

export function createLogger(options: LoggerOptions = {}): Logger {
    return new Logger(options);
}
