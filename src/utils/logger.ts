export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const colors = {
    reset: '\x1b[0m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    cyan: '\x1b[36m',
};

const levelColors: Record<LogLevel, string> = {
    debug: colors.dim,
    info: colors.green,
    warn: colors.yellow,
    error: colors.red,
};

const levelIcons: Record<LogLevel, string> = {
    debug: '🔍',
    info: '✅',
    warn: '⚠️',
    error: '❌',
};

const levelRank: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
    return value in levelRank;
}

function initialLevel(): LogLevel {
    const fromEnv = (process.env.LOG_LEVEL || '').toLowerCase();
    return isLogLevel(fromEnv) ? fromEnv : 'info';
}

// Shared by every child so one setLevel() call silences the whole tree
const threshold = { level: initialLevel() };

class Logger {
    private context: string;

    constructor(context: string = 'App') {
        this.context = context;
    }

    private log(level: LogLevel, message: string, ...args: unknown[]): void {
        if (levelRank[level] < levelRank[threshold.level]) return;

        const timestamp = new Date().toISOString();
        const color = levelColors[level];
        const icon = levelIcons[level];
        const line = `${colors.dim}${timestamp}${colors.reset} ${icon} ${color}[${level.toUpperCase()}]${colors.reset} ${colors.cyan}[${this.context}]${colors.reset} ${message}`;

        if (level === 'error') {
            console.error(line, ...args);
        } else {
            console.log(line, ...args);
        }
    }

    debug(message: string, ...args: unknown[]): void {
        this.log('debug', message, ...args);
    }

    info(message: string, ...args: unknown[]): void {
        this.log('info', message, ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.log('warn', message, ...args);
    }

    error(message: string, ...args: unknown[]): void {
        this.log('error', message, ...args);
    }

    child(context: string): Logger {
        return new Logger(`${this.context}:${context}`);
    }

    setLevel(level: LogLevel): void {
        threshold.level = level;
    }
}

export const logger = new Logger('CPMM');
export { Logger };
