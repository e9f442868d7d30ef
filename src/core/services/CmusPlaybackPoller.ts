import type { PlaybackPoller, PollResult, TransportState } from "../interfaces/PlaybackPoller";
import type { TrackIdentity } from "../interfaces/TrackIdentity";
import { PlayerUnavailable, describeError } from "../errors";
import { Logger } from "../utils/Logger";
import { runCommand, type CommandRunner } from "../utils/process";

const TRANSPORT_STATES: readonly TransportState[] = ['playing', 'paused', 'stopped'];

/**
 * Samples cmus through `cmus-remote -Q`. One attempt per poll; retrying is the session's job.
 */
export class CmusPlaybackPoller implements PlaybackPoller {
    constructor(
        private readonly run: CommandRunner = runCommand,
        private readonly binary = 'cmus-remote',
        private readonly timeoutMs = 2000
    ) {}

    public async poll(): Promise<PollResult> {
        try {
            const result = await this.run(this.binary, ['-Q'], { timeoutMs: this.timeoutMs });
            if (result.code !== 0) {
                throw new PlayerUnavailable(result.stderr.trim() || `${this.binary} exited with ${result.code}`);
            }
            return parseCmusStatus(result.stdout);
        } catch (e) {
            const reason = describeError(e);
            Logger.debug(`[Poller] cmus unavailable: ${reason}`);
            return { status: 'unavailable', reason };
        }
    }
}

/**
 * Parses the key/value lines printed by `cmus-remote -Q`.
 */
export function parseCmusStatus(output: string): PollResult {
    let transport: TransportState | undefined;
    let filePath: string | undefined;
    let duration = 0;
    let position = 0;
    const tags: Record<string, string> = {};

    for (const line of output.split('\n')) {
        const space = line.indexOf(' ');
        if (space === -1) continue;
        const key = line.slice(0, space);
        const rest = line.slice(space + 1);

        switch (key) {
            case 'status':
                transport = TRANSPORT_STATES.find(s => s === rest.trim());
                break;
            case 'file':
                filePath = rest;
                break;
            case 'duration':
                duration = Number.parseInt(rest, 10);
                break;
            case 'position':
                position = Number.parseInt(rest, 10);
                break;
            case 'tag': {
                const tagSpace = rest.indexOf(' ');
                if (tagSpace !== -1) tags[rest.slice(0, tagSpace)] = rest.slice(tagSpace + 1);
                break;
            }
        }
    }

    if (!transport) {
        return { status: 'unavailable', reason: 'No status in cmus-remote output' };
    }
    if (!filePath || !Number.isFinite(duration) || duration <= 0) {
        return { status: 'idle' };
    }

    const track: TrackIdentity = { filePath };
    if (tags.artist?.trim()) track.artist = tags.artist;
    if (tags.title?.trim()) track.title = tags.title;

    return {
        status: 'sample',
        sample: {
            track,
            positionSeconds: Number.isFinite(position) ? Math.max(0, position) : 0,
            durationSeconds: duration,
            transport
        }
    };
}
