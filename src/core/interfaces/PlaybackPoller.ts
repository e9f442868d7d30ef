import type { TrackIdentity } from "./TrackIdentity";

export type TransportState = 'playing' | 'paused' | 'stopped';

export interface PlaybackSample {
    track: TrackIdentity;
    positionSeconds: number;
    /** Always greater than zero. */
    durationSeconds: number;
    transport: TransportState;
}

export type PollResult =
    | { status: 'sample'; sample: PlaybackSample }
    /** Player reachable, nothing loaded (or no usable duration). */
    | { status: 'idle' }
    | { status: 'unavailable'; reason: string };

export interface PlaybackPoller {
    poll(): Promise<PollResult>;
}
