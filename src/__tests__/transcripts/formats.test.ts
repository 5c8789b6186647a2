import { describe, it, expect } from 'vitest';
import {
    createOutputFormat,
    formatClock,
    formatSrtTimestamp,
    formatVttTimestamp,
    OUTPUT_FORMAT_IDS,
} from '../../transcripts/formats';
import { TranscriptionResult } from '../../transcripts/types';

const result: TranscriptionResult = {
    text: 'Hello there. General Kenobi.',
    segments: [
        { start: 0, end: 2.5, text: ' Hello there.' },
        {
            start: 3725.25,
            end: 3727,
            text: 'General Kenobi.',
            words: [
                { word: 'General', start: 3725.25, end: 3726, probability: 0.9 },
                { word: 'Kenobi.', start: 3726, end: 3727, probability: 0.7 },
            ],
        },
    ],
    language: 'en',
    duration: 3727,
    processingTime: 12.5,
    model: 'base',
};

describe('timestamps', () => {
    it('formats 3725.25 seconds in every style', () => {
        expect(formatClock(3725.25)).toBe('01:02:05');
        expect(formatSrtTimestamp(3725.25)).toBe('01:02:05,250');
        expect(formatVttTimestamp(3725.25)).toBe('01:02:05.250');
    });

    it('clamps negative values to zero', () => {
        expect(formatSrtTimestamp(-3)).toBe('00:00:00,000');
    });

    it('truncates milliseconds instead of rounding', () => {
        expect(formatVttTimestamp(59.9999)).toBe('00:00:59.999');
    });
});

describe('output formats', () => {
    it('exposes the closed set of ids', () => {
        expect(OUTPUT_FORMAT_IDS).toEqual(['txt', 'srt', 'vtt', 'json']);
        expect(OUTPUT_FORMAT_IDS.map(id => createOutputFormat(id).extension)).toEqual(['.txt', '.srt', '.vtt', '.json']);
    });

    it('renders plain text with a trailing newline', () => {
        expect(createOutputFormat('txt').render(result)).toBe('Hello there. General Kenobi.\n');
    });

    it('does not double the trailing newline', () => {
        expect(createOutputFormat('txt').render({ ...result, text: 'done\n' })).toBe('done\n');
    });

    it('renders timestamped text lines', () => {
        const text = createOutputFormat('txt', { includeTimestamps: true }).render(result);
        expect(text).toBe('[00:00:00 --> 00:00:02] Hello there.\n[01:02:05 --> 01:02:07] General Kenobi.\n');
    });

    it('falls back to plain text when timestamps are requested but there are no segments', () => {
        const text = createOutputFormat('txt', { includeTimestamps: true }).render({ ...result, segments: [] });
        expect(text).toBe('Hello there. General Kenobi.\n');
    });

    it('renders SubRip cues', () => {
        expect(createOutputFormat('srt').render(result)).toBe(
            '1\n00:00:00,000 --> 00:00:02,500\nHello there.\n\n' +
            '2\n01:02:05,250 --> 01:02:07,000\nGeneral Kenobi.\n\n',
        );
    });

    it('renders WebVTT with its header and unnumbered cues', () => {
        expect(createOutputFormat('vtt').render(result)).toBe(
            'WEBVTT\n\n' +
            '00:00:00.000 --> 00:00:02.500\nHello there.\n\n' +
            '01:02:05.250 --> 01:02:07.000\nGeneral Kenobi.\n\n',
        );
    });

    it('renders detailed JSON with metadata', () => {
        const json = createOutputFormat('json').render(result);
        const parsed = JSON.parse(json);

        expect(json.split('\n')[1]).toBe('  "text": "Hello there. General Kenobi.",');
        expect(parsed.language).toBe('en');
        expect(parsed.duration).toBe(3727);
        expect(parsed.processingTime).toBe(12.5);
        expect(parsed.model).toBe('base');
        expect(parsed.segments).toHaveLength(2);
        expect(parsed.confidenceScores).toEqual([0.9, 0.7]);
        expect(parsed.metadata.totalSegments).toBe(2);
        expect(parsed.metadata.totalWords).toBe(4);
        expect(parsed.metadata.averageConfidence).toBeCloseTo(0.8, 10);
    });

    it('reports zero confidence when there are no word timings', () => {
        const parsed = JSON.parse(createOutputFormat('json').render({ ...result, segments: [result.segments[0]] }));
        expect(parsed.confidenceScores).toEqual([]);
        expect(parsed.metadata.averageConfidence).toBe(0);
        expect(parsed.metadata.totalWords).toBe(2);
    });
});
