import type { AppConfig } from "../config/AppConfig";
import { ConfigurationConflict } from "../errors";
import type { LyricsProvider } from "../interfaces/LyricsProvider";
import { Logger } from "../utils/Logger";
import { AzLyricsScrapeProvider } from "./AzLyricsScrapeProvider";
import { GeniusApiProvider } from "./GeniusApiProvider";

function isHttpUrl(value: string): boolean {
    try {
        const url = new URL(value);
        return url.protocol === 'http:' || url.protocol === 'https:';
    } catch {
        return false;
    }
}

/**
 * Picks the single remote provider for this run: the API when a token is
 * configured, the scraper otherwise. Returns null when neither is usable,
 * in which case remote lookups behave as offline.
 */
export function createLyricsProvider(config: AppConfig): LyricsProvider | null {
    if (config.apiToken) {
        Logger.info("[Providers] Using Genius API.");
        return new GeniusApiProvider(config.apiToken);
    }
    if (isHttpUrl(config.scrapeBaseUrl)) {
        Logger.info(`[Providers] No API token, scraping ${config.scrapeBaseUrl}.`);
        return new AzLyricsScrapeProvider(config.scrapeBaseUrl);
    }

    const conflict = new ConfigurationConflict(
        `No API token and no usable scrape URL ("${config.scrapeBaseUrl}"); remote lookups disabled`
    );
    Logger.warn(`[Providers] ${conflict.message}`, conflict);
    return null;
}
