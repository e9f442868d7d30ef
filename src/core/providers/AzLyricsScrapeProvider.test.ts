import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AzLyricsScrapeProvider, extractAzLyrics, urlPart } from './AzLyricsScrapeProvider';

const PAGE = `<html><body>
<div class="ringtone"></div>
<b>"Test Song"</b>
<div>
<!-- Usage of azlyrics.com content by any third-party lyrics provider is prohibited by our licensing agreement. Sorry about that. -->
<br>
First line<br>
Don&#039;t stop<br>
<i>[Chorus]</i><br>
Last line
</div>
</body></html>`;

describe('AzLyricsScrapeProvider', () => {
    let provider: AzLyricsScrapeProvider;
    const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>();

    beforeEach(() => {
        provider = new AzLyricsScrapeProvider('https://lyrics.test/');
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should build the canonical page url', () => {
        expect(provider.buildUrl({ artist: 'The Beatles', title: "Don't Let Me Down" }))
            .toBe('https://lyrics.test/lyrics/thebeatles/dontletmedown.html');
    });

    it('should extract the lyrics block from the page', async () => {
        fetchMock.mockResolvedValueOnce(new Response(PAGE));

        const outcome = await provider.fetch({ artist: 'Test Artist', title: 'Test Song' });

        expect(fetchMock.mock.calls[0][0]).toBe('https://lyrics.test/lyrics/testartist/testsong.html');
        expect(outcome).toEqual({ status: 'found', text: "First line\nDon't stop\n[Chorus]\nLast line" });
    });

    it('should still answer when the page holds an out-of-range character reference', async () => {
        fetchMock.mockResolvedValueOnce(new Response(PAGE.replace('Last line', 'Last &#99999999; line')));

        const outcome = await provider.fetch({ artist: 'Test Artist', title: 'Test Song' });

        expect(outcome).toEqual({ status: 'found', text: "First line\nDon't stop\n[Chorus]\nLast &#99999999; line" });
    });

    it('should report not_found for a missing page', async () => {
        fetchMock.mockResolvedValueOnce(new Response('gone', { status: 404 }));
        expect(await provider.fetch({ artist: 'A', title: 'B' })).toEqual({ status: 'not_found' });
    });

    it('should report an error for other failures', async () => {
        fetchMock.mockResolvedValueOnce(new Response('busy', { status: 503 }));
        const outcome = await provider.fetch({ artist: 'A', title: 'B' });
        expect(outcome.status).toBe('error');
    });

    it('should not query when nothing is left of the names', async () => {
        expect(await provider.fetch({ artist: '!!!', title: 'B' })).toEqual({ status: 'not_found' });
        expect(fetchMock).not.toHaveBeenCalled();
    });
});

describe('urlPart', () => {
    it('should keep ASCII letters and digits only', () => {
        expect(urlPart('AC/DC')).toBe('acdc');
        expect(urlPart('Sigur Rós')).toBe('sigurrs');
    });
});

describe('extractAzLyrics', () => {
    it('should return null without the marker comment', () => {
        expect(extractAzLyrics('<div>Some text</div>')).toBeNull();
    });
});
