import { describe, it, expect } from 'vitest';
import { EventChannel } from './EventChannel';

describe('EventChannel', () => {
    it('should deliver buffered events in order', async () => {
        const channel = new EventChannel<number>();
        channel.push(1);
        channel.push(2);
        channel.close();

        const seen: number[] = [];
        for await (const event of channel) {
            seen.push(event);
        }
        expect(seen).toEqual([1, 2]);
    });

    it('should wake a waiting consumer', async () => {
        const channel = new EventChannel<string>();
        const pending = channel.next();
        channel.push('tick');
        await expect(pending).resolves.toEqual({ value: 'tick', done: false });
    });

    it('should end a waiting consumer on close and reject later pushes', async () => {
        const channel = new EventChannel<string>();
        const pending = channel.next();
        channel.close();
        await expect(pending).resolves.toEqual({ value: undefined, done: true });
        expect(channel.push('late')).toBe(false);
        await expect(channel.next()).resolves.toEqual({ value: undefined, done: true });
    });
});
