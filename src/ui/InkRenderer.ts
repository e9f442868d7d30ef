import type { LyricsRenderer, RenderFrame } from "@/core/models/RenderFrame";
import { emptyDocument } from "@/core/models/LyricsDocument";
import { Logger } from "@/core/utils/Logger";

type Listener = () => void;

const INITIAL_FRAME: RenderFrame = {
    lines: emptyDocument().lines,
    offset: 0,
    mode: 'manual',
    status: 'starting',
    source: 'none',
    track: null
};

/**
 * Bridge between the session and the Ink tree.
 * The session pushes frames in, components read them through `subscribe`/`getFrame`
 * (shaped for `useSyncExternalStore`) and push key presses back through `scroll`.
 */
export class InkRenderer implements LyricsRenderer {
    private frame: RenderFrame = INITIAL_FRAME;
    private listeners = new Set<Listener>();
    private scrollHandlers = new Set<(delta: number) => void>();

    public render(frame: RenderFrame) {
        this.frame = frame;
        this.listeners.forEach(l => l());
    }

    public onScroll(handler: (delta: number) => void): () => void {
        this.scrollHandlers.add(handler);
        return () => {
            this.scrollHandlers.delete(handler);
        };
    }

    public scroll(delta: number) {
        if (delta === 0) return;
        Logger.debug(`[Renderer] Scroll ${delta}`);
        this.scrollHandlers.forEach(h => h(delta));
    }

    public subscribe = (listener: Listener): (() => void) => {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    };

    public getFrame = (): RenderFrame => this.frame;
}
