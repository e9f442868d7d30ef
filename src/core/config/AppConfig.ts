import { parseArgs } from 'node:util';
import { ConfigurationError } from '../errors';
import type { LogLevel } from '../utils/Logger';

/**
 * Process-wide settings, fixed at startup.
 */
export interface AppConfig {
    /** Genius API token. Absent selects the scrape provider. */
    apiToken?: string;
    clearHeaders: boolean;
    saveTags: boolean;
    autoScroll: boolean;
    offline: boolean;

    // Renderer
    center: boolean;
    limitHeight?: number;
    /** 8-bit ANSI color for lyrics lines, -1 for the terminal default. */
    color: number;
    /** 8-bit ANSI color for the focused line. */
    colorCurrent: number;

    // Session timing
    pollIntervalMs: number;
    maxBackoffMs: number;
    requestTimeoutMs: number;

    scrapeBaseUrl: string;
    logFile?: string;
    logLevel: LogLevel;
}

export const DEFAULT_CONFIG: AppConfig = {
    clearHeaders: false,
    saveTags: false,
    autoScroll: false,
    offline: false,
    center: false,
    color: -1,
    colorCurrent: 3,
    pollIntervalMs: 1000,
    maxBackoffMs: 8000,
    requestTimeoutMs: 10000,
    scrapeBaseUrl: 'https://www.azlyrics.com',
    logLevel: 'info'
};

export type CliRequest =
    | { kind: 'run'; config: AppConfig }
    | { kind: 'help' }
    | { kind: 'version' };

export const USAGE = `Usage: cmus-lyrics-pane [token] [options]

Shows lyrics for the track playing in cmus and follows playback.

Arguments:
  token                  Genius API token; without it lyrics are scraped from AZLyrics
                         (also read from GENIUS_ACCESS_TOKEN)

Options:
  -c, --clear-headers    remove section headers such as [Chorus] from downloaded lyrics
  -s, --save-tags        save lyrics, artist and title tags when the lyrics tag is missing
  -a, --auto-scroll      scroll lyrics along with the position in the track
  -o, --offline          only read lyrics from tags, never go online
  -e, --center           center lyrics horizontally
  -l, --limit-height N   show at most N lines, centered vertically
      --color N          8-bit ANSI color for lyrics (-1 = terminal default)
      --color-current N  8-bit ANSI color for the current line (default 3)
      --poll-interval MS player poll interval (default 1000)
      --max-backoff MS   longest wait between polls while cmus is gone (default 8000)
      --timeout MS       lyrics request timeout (default 10000)
      --log-file PATH    append JSON log lines to PATH (also CMUS_LYRICS_LOG)
      --log-level LEVEL  debug, info, warn or error (default info)
  -h, --help             show this help
  -v, --version          show version`;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseInteger(name: string, raw: string | undefined, fallback: number, min: number): number {
    if (raw === undefined) return fallback;
    if (!/^-?\d+$/.test(raw.trim())) {
        throw new ConfigurationError(`--${name} expects an integer, got "${raw}"`);
    }
    const value = parseInt(raw, 10);
    if (value < min) {
        throw new ConfigurationError(`--${name} must be at least ${min}, got ${value}`);
    }
    return value;
}

function parseColor(name: string, raw: string | undefined, fallback: number): number {
    const value = parseInteger(name, raw, fallback, -1);
    if (value > 255) {
        throw new ConfigurationError(`--${name} must be an 8-bit color (0-255) or -1, got ${value}`);
    }
    return value;
}

function nonEmpty(value: string | undefined): string | undefined {
    return value !== undefined && value.trim() !== '' ? value : undefined;
}

function parseCommandLine(argv: string[]) {
    return parseArgs({
        args: argv,
        allowPositionals: true,
        strict: true,
        options: {
            'clear-headers': { type: 'boolean', short: 'c' },
            'save-tags': { type: 'boolean', short: 's' },
            'auto-scroll': { type: 'boolean', short: 'a' },
            offline: { type: 'boolean', short: 'o' },
            center: { type: 'boolean', short: 'e' },
            'limit-height': { type: 'string', short: 'l' },
            color: { type: 'string' },
            'color-current': { type: 'string' },
            'poll-interval': { type: 'string' },
            'max-backoff': { type: 'string' },
            timeout: { type: 'string' },
            'log-file': { type: 'string' },
            'log-level': { type: 'string' },
            help: { type: 'boolean', short: 'h' },
            version: { type: 'boolean', short: 'v' }
        }
    });
}

/**
 * Builds the configuration from the command line (without the node and script
 * entries) and the environment. Command line values win.
 * @throws ConfigurationError for unknown options or malformed values.
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv): CliRequest {
    let parsed: ReturnType<typeof parseCommandLine>;
    try {
        parsed = parseCommandLine(argv);
    } catch (e) {
        throw new ConfigurationError(e instanceof Error ? e.message : String(e), { cause: e });
    }

    const { values, positionals } = parsed;
    if (values.help) return { kind: 'help' };
    if (values.version) return { kind: 'version' };

    if (positionals.length > 1) {
        throw new ConfigurationError(`Expected at most one positional argument (token), got ${positionals.length}`);
    }

    const logLevel = values['log-level'] ?? DEFAULT_CONFIG.logLevel;
    const level = LOG_LEVELS.find(l => l === logLevel);
    if (!level) {
        throw new ConfigurationError(`--log-level must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`);
    }

    const limitHeight = values['limit-height'] === undefined
        ? undefined
        : parseInteger('limit-height', values['limit-height'], 0, 1);

    const config: AppConfig = {
        apiToken: nonEmpty(positionals[0]) ?? nonEmpty(env.GENIUS_ACCESS_TOKEN),
        clearHeaders: values['clear-headers'] ?? false,
        saveTags: values['save-tags'] ?? false,
        autoScroll: values['auto-scroll'] ?? false,
        offline: values.offline ?? false,
        center: values.center ?? false,
        limitHeight,
        color: parseColor('color', values.color, DEFAULT_CONFIG.color),
        colorCurrent: parseColor('color-current', values['color-current'], DEFAULT_CONFIG.colorCurrent),
        pollIntervalMs: parseInteger('poll-interval', values['poll-interval'], DEFAULT_CONFIG.pollIntervalMs, 50),
        maxBackoffMs: parseInteger('max-backoff', values['max-backoff'], DEFAULT_CONFIG.maxBackoffMs, 50),
        requestTimeoutMs: parseInteger('timeout', values.timeout, DEFAULT_CONFIG.requestTimeoutMs, 100),
        scrapeBaseUrl: env.LYRICS_SCRAPE_BASE_URL ?? DEFAULT_CONFIG.scrapeBaseUrl,
        logFile: nonEmpty(values['log-file']) ?? nonEmpty(env.CMUS_LYRICS_LOG),
        logLevel: level
    };

    if (config.maxBackoffMs < config.pollIntervalMs) {
        config.maxBackoffMs = config.pollIntervalMs;
    }

    return { kind: 'run', config: Object.freeze(config) };
}
