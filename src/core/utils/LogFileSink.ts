import { createWriteStream } from 'node:fs';
import { describeError } from '../errors';
import type { LogEntry } from './Logger';
import { Logger } from './Logger';

export function formatLogLine(entry: LogEntry): string {
    const record: Record<string, unknown> = {
        time: new Date(entry.timestamp).toISOString(),
        level: entry.level,
        message: entry.message
    };
    if (entry.data !== undefined) {
        record.data = entry.data instanceof Error ? describeError(entry.data) : entry.data;
    }
    return JSON.stringify(record) + '\n';
}

/**
 * Appends every log entry to `filePath` as one JSON object per line.
 * @returns a function that detaches the sink and waits for the file to be flushed.
 */
export function attachLogFile(filePath: string, logger = Logger): () => Promise<void> {
    const stream = createWriteStream(filePath, { flags: 'a' });
    const unsubscribe = logger.subscribe(entry => {
        stream.write(formatLogLine(entry));
    });
    stream.on('error', (e) => {
        unsubscribe();
        logger.error(`[Logger] Cannot write ${filePath}`, describeError(e));
    });

    return () => new Promise<void>(resolve => {
        unsubscribe();
        if (stream.closed) {
            resolve();
            return;
        }
        stream.once('close', () => resolve());
        stream.end();
    });
}
