import { render } from 'ink';
import { type CliRequest, USAGE, loadConfig } from '@/core/config/AppConfig';
import { ConfigurationError, describeError } from '@/core/errors';
import { createLyricsProvider } from '@/core/providers';
import { CmusPlaybackPoller } from '@/core/services/CmusPlaybackPoller';
import { LyricsResolver } from '@/core/services/LyricsResolver';
import { LyricsSession } from '@/core/services/LyricsSession';
import { MetadataTagStore } from '@/core/services/MetadataTagStore';
import { attachLogFile } from '@/core/utils/LogFileSink';
import { Logger } from '@/core/utils/Logger';
import App from '@/ui/App';
import { InkRenderer } from '@/ui/InkRenderer';

const VERSION = '0.3.0';

async function main(): Promise<number> {
    let request: CliRequest;
    try {
        request = loadConfig(process.argv.slice(2), process.env);
    } catch (e) {
        if (e instanceof ConfigurationError) {
            console.error(`cmus-lyrics-pane: ${e.message}\n\n${USAGE}`);
            return 2;
        }
        throw e;
    }

    if (request.kind === 'help') {
        console.log(USAGE);
        return 0;
    }
    if (request.kind === 'version') {
        console.log(VERSION);
        return 0;
    }

    const { config } = request;
    Logger.setLevel(config.logLevel);
    const detachLog = config.logFile ? attachLogFile(config.logFile) : undefined;
    Logger.info(`[CLI] cmus-lyrics-pane ${VERSION} starting`);

    const renderer = new InkRenderer();
    const session = new LyricsSession(config, {
        poller: new CmusPlaybackPoller(),
        resolver: new LyricsResolver(config, createLyricsProvider(config)),
        tagStore: new MetadataTagStore(),
        renderer
    });

    // The terminal belongs to Ink from here on
    Logger.setConsoleEcho(false);
    const app = render(<App renderer={renderer} display={config} />);
    const onSignal = () => app.unmount();
    process.once('SIGTERM', onSignal);

    session.start();
    try {
        await app.waitUntilExit();
    } finally {
        process.off('SIGTERM', onSignal);
        await session.stop();
        Logger.info('[CLI] Stopped');
        Logger.setConsoleEcho(true);
        await detachLog?.();
    }
    return 0;
}

main().then(
    (code) => {
        process.exitCode = code;
    },
    (e: unknown) => {
        console.error(`cmus-lyrics-pane: ${describeError(e)}`);
        process.exitCode = 1;
    }
);
