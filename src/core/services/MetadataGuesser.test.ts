import { describe, it, expect } from 'vitest';
import { guessTrack } from './MetadataGuesser';

describe('guessTrack', () => {
    it('should split "artist - title" names', () => {
        expect(guessTrack('/music/Muse - Uprising.mp3')).toEqual({
            artist: 'Muse',
            title: 'Uprising',
            filePath: '/music/Muse - Uprising.mp3'
        });
    });

    it('should split "artist-title" names', () => {
        expect(guessTrack('/music/Muse-Uprising.flac')).toEqual({
            artist: 'Muse',
            title: 'Uprising',
            filePath: '/music/Muse-Uprising.flac'
        });
    });

    it('should prefer the spaced separator over inner hyphens', () => {
        const guess = guessTrack('/m/Jay-Z - Empire State of Mind.ogg');
        expect(guess.artist).toBe('Jay-Z');
        expect(guess.title).toBe('Empire State of Mind');
    });

    it('should keep the title after the first hyphen intact', () => {
        const guess = guessTrack('/m/Artist-Title-Remastered.mp3');
        expect(guess.artist).toBe('Artist');
        expect(guess.title).toBe('Title-Remastered');
    });

    it('should fall back to the parent directory as artist', () => {
        expect(guessTrack('Radiohead/OK Computer.flac')).toEqual({
            artist: 'Radiohead',
            title: 'OK Computer',
            filePath: 'Radiohead/OK Computer.flac'
        });
    });

    it('should only strip the last extension', () => {
        expect(guessTrack('/m/Band/Live.at.Home.wav').title).toBe('Live.at.Home');
    });

    it('should leave artist absent without a parent directory', () => {
        expect(guessTrack('Song.mp3')).toEqual({ title: 'Song', filePath: 'Song.mp3' });
    });

    it('should return absent fields when no title can be derived', () => {
        expect(guessTrack('/m/Artist - .mp3')).toEqual({ filePath: '/m/Artist - .mp3' });
    });
});
