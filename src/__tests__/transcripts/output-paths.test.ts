import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { detailedJsonPathFor, outputPathFor, sanitizeSegment, tempAudioPathFor } from '../../transcripts/output-paths';
import { WorkItem } from '../../transcripts/types';

const item: WorkItem = {
    path: path.join('/media', 'talks', 'day:1', 'intro.final.mp4'),
    relativePath: 'talks/day:1/intro.final.mp4',
    size: 10,
    mtimeMs: 1_700_000_000_000,
    identity: '0123456789abcdef0123456789abcdef',
};

describe('sanitizeSegment', () => {
    it('removes characters that are invalid in filenames', () => {
        expect(sanitizeSegment('a<b>c:"d|e?f*')).toBe('abcdef');
        expect(sanitizeSegment('tab\there')).toBe('tabhere');
    });

    it('trims trailing dots and spaces', () => {
        expect(sanitizeSegment('notes. . ')).toBe('notes');
    });

    it('prefixes reserved device names', () => {
        expect(sanitizeSegment('con')).toBe('_con');
        expect(sanitizeSegment('LPT1.txt')).toBe('_LPT1.txt');
        expect(sanitizeSegment('console')).toBe('console');
    });

    it('never returns an empty segment', () => {
        expect(sanitizeSegment('...')).toBe('_');
        expect(sanitizeSegment('???')).toBe('_');
    });
});

describe('output paths', () => {
    it('mirrors the relative path with the new extension', () => {
        expect(outputPathFor(item, '/out', '.srt')).toBe(path.join('/out', 'talks', 'day1', 'intro.final.srt'));
    });

    it('puts temp audio under the temp dir with an identity prefix', () => {
        expect(tempAudioPathFor(item, '/tmp/audio')).toBe(path.join('/tmp/audio', 'intro.final_01234567.wav'));
    });

    it('places the detailed JSON beside the output', () => {
        expect(detailedJsonPathFor('/out/a.txt')).toBe('/out/a.json');
        expect(detailedJsonPathFor('/out/a.json')).toBe('/out/a.detailed.json');
    });
});
