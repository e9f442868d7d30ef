export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
    timestamp: number;
    level: LogLevel;
    message: string;
    data?: unknown;
}

type LogListener = (entry: LogEntry) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

class LoggerService {
    private listeners: LogListener[] = [];
    private minLevel: LogLevel = 'info';
    private consoleEcho = true;

    public subscribe(listener: LogListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    public setLevel(level: LogLevel) {
        this.minLevel = level;
    }

    /**
     * Console output is turned off while the terminal UI owns stdout,
     * otherwise log lines would tear the rendered frame.
     */
    public setConsoleEcho(enabled: boolean) {
        this.consoleEcho = enabled;
    }

    private emit(level: LogLevel, message: string, data?: unknown) {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

        const entry: LogEntry = {
            timestamp: Date.now(),
            level,
            message,
            data
        };
        if (this.consoleEcho) {
            console[level](`[${level.toUpperCase()}] ${message}`, data ?? '');
        }

        this.listeners.forEach(l => l(entry));
    }

    public info(msg: string, data?: unknown) { this.emit('info', msg, data); }
    public warn(msg: string, data?: unknown) { this.emit('warn', msg, data); }
    public error(msg: string, data?: unknown) { this.emit('error', msg, data); }
    public debug(msg: string, data?: unknown) { this.emit('debug', msg, data); }
}

export const Logger = new LoggerService();
