// src/utils/logger.ts

import { CONFIG } from '../config';

/** Defines logging severity levels. */
export enum LogLevel {
    NONE = 0,
    ERROR = 1,
    WARN = 2,
    INFO = 3,
    DEBUG = 4,
}

type LogArg = string | number | boolean | object | null | undefined;

// --- Log Buffering ---
let logBuffer: string[] = [];
const MAX_LOG_BUFFER_SIZE = 20000; // Lines kept in memory for the log download

function getConfiguredLogLevel(): LogLevel {
    const configLevelString = CONFIG.LOG_LEVEL.toUpperCase();
    switch (configLevelString) {
        case 'NONE': return LogLevel.NONE;
        case 'ERROR': return LogLevel.ERROR;
        case 'WARN': return LogLevel.WARN;
        case 'INFO': return LogLevel.INFO;
        case 'DEBUG': return LogLevel.DEBUG;
        default:
            console.warn(`[Logger Init WARN] Invalid LOG_LEVEL in CONFIG: "${CONFIG.LOG_LEVEL}". Defaulting to INFO.`);
            return LogLevel.INFO;
    }
}

let currentLogLevel = getConfiguredLogLevel();

function _logAndBuffer(level: LogLevel, levelStr: string, message: string): void {
    const formattedMessage = `[${new Date().toISOString()}] [${levelStr}] ${message}`;

    logBuffer.push(formattedMessage);
    if (logBuffer.length > MAX_LOG_BUFFER_SIZE) {
        logBuffer.shift();
    }

    switch (level) {
        case LogLevel.DEBUG: console.debug(formattedMessage); break;
        case LogLevel.INFO:  console.log(formattedMessage);   break;
        case LogLevel.WARN:  console.warn(formattedMessage);  break;
        case LogLevel.ERROR: console.error(formattedMessage); break;
    }
}

// Errors stringify to "{}", so they get their message instead
function formatArgs(args: LogArg[]): string {
    return args.map(arg => {
        if (arg instanceof Error) {
            return `${arg.name}: ${arg.message}`;
        }
        if (typeof arg === 'object' && arg !== null) {
            try { return JSON.stringify(arg); } catch { return String(arg); }
        }
        return String(arg);
    }).join(' ');
}

interface Logger {
    debug(...args: LogArg[]): void;
    info(...args: LogArg[]): void;
    warn(...args: LogArg[]): void;
    error(...args: LogArg[]): void;

    setLogLevel(level: LogLevel): void;
    getCurrentLogLevel(): LogLevel;
    clearLogBuffer(): void;
    getLogBufferAsString(includeHeader?: boolean): string;
    downloadLogFile(filename?: string): void;
}

export const logger: Logger = {
    debug(...args: LogArg[]): void {
        if (currentLogLevel >= LogLevel.DEBUG) {
            _logAndBuffer(LogLevel.DEBUG, 'DEBUG', formatArgs(args));
        }
    },
    info(...args: LogArg[]): void {
        if (currentLogLevel >= LogLevel.INFO) {
            _logAndBuffer(LogLevel.INFO, 'INFO', formatArgs(args));
        }
    },
    warn(...args: LogArg[]): void {
        if (currentLogLevel >= LogLevel.WARN) {
            _logAndBuffer(LogLevel.WARN, 'WARN', formatArgs(args));
        }
    },
    error(...args: LogArg[]): void {
        if (currentLogLevel >= LogLevel.ERROR) {
            _logAndBuffer(LogLevel.ERROR, 'ERROR', formatArgs(args));
        }
    },

    /** Changes the level at runtime (e.g. from the dev console). */
    setLogLevel(level: LogLevel): void {
        if (level >= LogLevel.NONE && level <= LogLevel.DEBUG) {
            currentLogLevel = level;
            if (currentLogLevel >= LogLevel.INFO) {
                console.log(`[Logger INFO] Log level set to ${LogLevel[level]} (${level})`);
            }
        } else {
            console.warn(`[Logger WARN] Attempted to set invalid log level: ${level}`);
        }
    },

    getCurrentLogLevel(): LogLevel {
        return currentLogLevel;
    },

    clearLogBuffer(): void {
        logBuffer = [];
        if (currentLogLevel >= LogLevel.INFO) {
            console.log('[Logger INFO] Internal log buffer cleared.');
        }
    },

    /** Buffered log lines joined with newlines, optionally behind a session header. */
    getLogBufferAsString(includeHeader: boolean = true): string {
        let logContent = '';
        if (includeHeader) {
            logContent += `--- Starfield Client Log ---\n`;
            logContent += `Timestamp: ${new Date().toISOString()}\n`;
            logContent += `Session Seed: "${CONFIG.SEED}"\n`;
            logContent += `Log Level Setting: ${CONFIG.LOG_LEVEL} (Active: ${LogLevel[currentLogLevel]})\n`;
            logContent += `Logical Resolution: ${CONFIG.LOGICAL_WIDTH}x${CONFIG.LOGICAL_HEIGHT}\n`;
            logContent += `Current Buffer Size: ${logBuffer.length}/${MAX_LOG_BUFFER_SIZE}\n`;
            logContent += `----------------------------\n\n`;
        }
        logContent += logBuffer.join('\n');
        return logContent;
    },

    /** Triggers a browser download of the buffered log. */
    downloadLogFile(filename?: string): void {
        this.info('--- Preparing log file for download... ---');
        const finalFilename = filename || `starfield_log_${new Date().toISOString().replace(/[:.]/g, '-')}.txt`;
        try {
            const blob = new Blob([this.getLogBufferAsString(true)], { type: 'text/plain;charset=utf-8' });
            const url = URL.createObjectURL(blob);

            const link = document.createElement('a');
            link.href = url;
            link.download = finalFilename;
            link.style.display = 'none';

            document.body.appendChild(link);
            link.click();
            document.body.removeChild(link);
            URL.revokeObjectURL(url);

            this.info(`Log file download triggered as "${finalFilename}".`);
        } catch (error) {
            this.error('Failed to prepare or trigger log file download:', error instanceof Error ? error : String(error));
        }
    },
};
