import { mkdirSync, existsSync, appendFileSync } from 'fs';
import { join } from 'path';
import { env } from '../config/env.js';

const EVENTS_LOG_FILE = join(env.LOG_DIR, 'events.jsonl');

let logsDirReady = false;

// Created on first write so that runs with LOG_TO_FILE=false leave no directory behind
function ensureLogsDir() {
    if (logsDirReady) {
        return;
    }
    if (!existsSync(env.LOG_DIR)) {
        mkdirSync(env.LOG_DIR, { recursive: true });
    }
    logsDirReady = true;
}

/**
 * Supported log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log event structure
 */
export interface LogEvent {
    timestamp: string;
    type: string;
    level?: LogLevel;
    payload: unknown;
}

/**
 * Log level priority for threshold filtering
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
    debug: '\x1b[36m', // Cyan
    info: '\x1b[32m',  // Green
    warn: '\x1b[33m',  // Yellow
    error: '\x1b[31m', // Red
};

/**
 * Check if a log level should be emitted based on configured threshold
 */
export function shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[env.LOG_LEVEL];
}

/**
 * Message of a caught value, for log payloads
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Logs an event to console and optionally to a JSONL file
 * @param type - Event type/category, dotted (e.g. `feed.connected`)
 * @param payload - Event data
 * @param level - Log level (default: 'info')
 */
export function logEvent(type: string, payload: unknown, level: LogLevel = 'info') {
    if (!shouldLog(level)) {
        return;
    }

    const event: LogEvent = {
        timestamp: new Date().toISOString(),
        type,
        level,
        payload,
    };

    const reset = '\x1b[0m';
    const line = `${LEVEL_COLORS[level]}[${event.timestamp}] [${level.toUpperCase()}] [${type}]${reset}`;
    const body = typeof payload === 'object' ? JSON.stringify(payload) : payload;

    if (level === 'error') {
        console.error(line, body);
    } else {
        console.log(line, body);
    }

    if (env.LOG_TO_FILE) {
        try {
            ensureLogsDir();
            appendFileSync(EVENTS_LOG_FILE, JSON.stringify(event) + '\n', 'utf-8');
        } catch (error) {
            console.error('Failed to write to log file:', describeError(error));
        }
    }
}

/**
 * Convenience methods for different log levels
 */
export const logger = {
    debug: (type: string, payload: unknown) => logEvent(type, payload, 'debug'),
    info: (type: string, payload: unknown) => logEvent(type, payload, 'info'),
    warn: (type: string, payload: unknown) => logEvent(type, payload, 'warn'),
    error: (type: string, payload: unknown) => logEvent(type, payload, 'error'),
};
