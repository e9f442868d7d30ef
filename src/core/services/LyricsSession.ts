import type { AppConfig } from "../config/AppConfig";
import { describeError } from "../errors";
import type { PlaybackPoller, PlaybackSample } from "../interfaces/PlaybackPoller";
import type { TagStore } from "../interfaces/TagStore";
import { type TrackIdentity, describeTrack, sameIdentity } from "../interfaces/TrackIdentity";
import { type LyricsDocument, emptyDocument } from "../models/LyricsDocument";
import type { LyricsRenderer, RenderFrame, SessionStatus } from "../models/RenderFrame";
import { EventChannel } from "../utils/EventChannel";
import { Logger } from "../utils/Logger";
import type { LyricsResolver } from "./LyricsResolver";
import { ScrollSynchronizer } from "./ScrollSynchronizer";

export type SessionOptions = Pick<AppConfig, 'autoScroll' | 'pollIntervalMs' | 'maxBackoffMs'>;

export interface SessionDependencies {
    poller: PlaybackPoller;
    resolver: LyricsResolver;
    tagStore: TagStore;
    renderer: LyricsRenderer;
}

export type SessionEvent =
    | { type: 'tick' }
    | { type: 'scroll'; delta: number };

/**
 * Ties player, resolver, synchronizer and renderer together.
 *
 * A timer feeds `tick` events and the renderer feeds `scroll` events into one
 * channel; a single loop handles them in order, so the session state below is
 * only ever touched from that loop.
 */
export class LyricsSession {
    private readonly channel = new EventChannel<SessionEvent>();
    private readonly sync: ScrollSynchronizer;

    private identity: TrackIdentity | null = null;
    private document: LyricsDocument = emptyDocument();
    private status: SessionStatus = 'starting';
    private delayMs: number;

    private timer: ReturnType<typeof setTimeout> | null = null;
    private loop: Promise<void> | null = null;
    private unsubscribeScroll: (() => void) | null = null;

    constructor(
        private readonly options: SessionOptions,
        private readonly deps: SessionDependencies
    ) {
        this.sync = new ScrollSynchronizer(options.autoScroll);
        this.delayMs = options.pollIntervalMs;
    }

    /** Wait before the next poll; grows while the player is unreachable. */
    public get currentDelayMs(): number {
        return this.delayMs;
    }

    public get currentStatus(): SessionStatus {
        return this.status;
    }

    /**
     * Starts polling immediately. Calling it twice has no effect.
     */
    public start() {
        if (this.loop || this.channel.isClosed) return;

        this.unsubscribeScroll = this.deps.renderer.onScroll(delta => {
            this.channel.push({ type: 'scroll', delta });
        });
        this.render();
        this.channel.push({ type: 'tick' });
        this.loop = this.run();
    }

    /**
     * Stops polling, lets the loop finish its current event and waits for tag writes.
     */
    public async stop(): Promise<void> {
        this.channel.close();
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        this.unsubscribeScroll?.();
        this.unsubscribeScroll = null;

        if (this.loop) await this.loop;
        await this.deps.resolver.flushWrites();
    }

    private async run(): Promise<void> {
        for await (const event of this.channel) {
            try {
                if (event.type === 'tick') {
                    await this.handleTick();
                    this.scheduleTick();
                } else {
                    this.handleScroll(event.delta);
                }
            } catch (e) {
                Logger.error(`[Session] Failed to handle ${event.type}`, describeError(e));
                if (event.type === 'tick') this.scheduleTick();
            }
        }
    }

    private scheduleTick() {
        if (this.channel.isClosed) return;
        this.timer = setTimeout(() => {
            this.timer = null;
            this.channel.push({ type: 'tick' });
        }, this.delayMs);
    }

    /**
     * One poll of the player and everything that follows from it.
     */
    public async handleTick(): Promise<void> {
        const result = await this.deps.poller.poll();

        if (result.status === 'unavailable') {
            if (this.status !== 'player-unavailable') {
                Logger.info(`[Session] Player unavailable: ${result.reason}`);
            }
            this.status = 'player-unavailable';
            this.delayMs = Math.min(this.delayMs * 2, this.options.maxBackoffMs);
            this.render();
            return;
        }

        this.delayMs = this.options.pollIntervalMs;

        if (result.status === 'idle') {
            this.status = 'idle';
            this.render();
            return;
        }

        await this.handleSample(result.sample);
    }

    public handleScroll(delta: number) {
        this.sync.manualScroll(delta);
        this.render();
    }

    private async handleSample(sample: PlaybackSample) {
        if (!sameIdentity(this.identity, sample.track)) {
            Logger.info(`[Session] Now playing ${describeTrack(sample.track)}`);
            this.identity = sample.track;
            this.document = emptyDocument();
            this.sync.trackChanged(sample.track, this.document);
            this.status = 'resolving';
            this.render();

            this.document = await this.deps.resolver.resolve(sample.track, this.deps.tagStore);
            this.sync.trackChanged(sample.track, this.document);
        }

        if (this.sync.getState().mode === 'auto') {
            this.sync.tick(sample);
        }
        this.status = this.document.lines.length > 0 ? 'ready' : 'no-lyrics';
        this.render();
    }

    private render() {
        const state = this.sync.getState();
        const frame: RenderFrame = {
            lines: this.document.lines,
            offset: state.offset,
            mode: state.mode,
            status: this.status,
            source: this.document.source,
            track: this.identity
        };
        this.deps.renderer.render(frame);
    }
}
