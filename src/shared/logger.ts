/**
 * Run logger
 * Writes every line to stdout/stderr and, when file logging is on, appends it
 * to the configured log file:
 *   2026-01-17T08:00:00.000Z INFO 🎧 Transcribing: lecture1.mp3
 */

import { createWriteStream, mkdirSync, WriteStream } from 'fs';
import * as path from 'path';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    /** Flush and close the log file stream, if any */
    close(): Promise<void>;
}

export interface LoggerOptions {
    level: LogLevel;
    console: boolean;
    file: boolean;
    logFile?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    DEBUG: 10,
    INFO: 20,
    WARNING: 30,
    ERROR: 40,
    CRITICAL: 50,
};

function getTimestamp(): string {
    return new Date().toISOString();
}

function reportLogFileFailure(logFile: string, error: unknown): void {
    const reason = error instanceof Error ? error.message : String(error);
    process.stderr.write(`${getTimestamp()} ERROR Cannot write log file ${logFile}, file logging disabled: ${reason}\n`);
}

/**
 * Open the append stream. Returns null if the log folder cannot be created.
 */
function openLogStream(logFile: string): WriteStream | null {
    try {
        mkdirSync(path.dirname(logFile), { recursive: true });
    } catch (error) {
        reportLogFileFailure(logFile, error);
        return null;
    }
    const stream = createWriteStream(logFile, { flags: 'a' });

    // Run separator
    stream.write(`\n${'='.repeat(60)}\n[${getTimestamp()}] ${process.argv.slice(1).join(' ')} (PID: ${process.pid})\n${'='.repeat(60)}\n`);
    return stream;
}

export function createLogger(options: LoggerOptions): Logger {
    const threshold = LEVEL_RANK[options.level];
    const logFile = options.file ? options.logFile : undefined;
    let stream = logFile ? openLogStream(logFile) : null;

    // An unwritable log file (directory, EACCES, full disk) only stops file output
    stream?.on('error', (error) => {
        if (!stream || !logFile) return;
        stream = null;
        reportLogFileFailure(logFile, error);
    });

    const write = (level: LogLevel, message: string): void => {
        if (LEVEL_RANK[level] < threshold) return;

        const line = `${getTimestamp()} ${level} ${message}\n`;
        stream?.write(line);

        if (options.console) {
            if (LEVEL_RANK[level] >= LEVEL_RANK.WARNING) {
                process.stderr.write(line);
            } else {
                process.stdout.write(line);
            }
        }
    };

    return {
        debug: (message) => write('DEBUG', message),
        info: (message) => write('INFO', message),
        warn: (message) => write('WARNING', message),
        error: (message) => write('ERROR', message),
        close: () => new Promise<void>((resolve) => {
            if (!stream) {
                resolve();
                return;
            }
            // Resolves on finish and on a write error alike
            stream.end(() => resolve());
        }),
    };
}

/** Console-only logger used before a configuration is available */
export function createConsoleLogger(level: LogLevel = 'INFO'): Logger {
    return createLogger({ level, console: true, file: false });
}
