/**
 * Detailed JSON output, also used for the `saveDetailedJson` sidecar
 */

import { TimedSegment, TranscriptionResult } from '../types';
import type { OutputFormat } from './index';

export interface StructuredMetadata {
    averageConfidence: number;
    totalSegments: number;
    totalWords: number;
}

export interface StructuredDocument {
    text: string;
    language: string;
    duration: number;
    processingTime: number;
    model: string;
    segments: TimedSegment[];
    confidenceScores: number[];
    metadata: StructuredMetadata;
}

function countWords(segment: TimedSegment): number {
    if (segment.words && segment.words.length > 0) {
        return segment.words.length;
    }
    return segment.text.split(/\s+/).filter(Boolean).length;
}

export function toStructuredDocument(result: TranscriptionResult): StructuredDocument {
    const confidenceScores = result.segments.flatMap(segment => (segment.words ?? []).map(word => word.probability));
    const averageConfidence = confidenceScores.length > 0
        ? confidenceScores.reduce((sum, p) => sum + p, 0) / confidenceScores.length
        : 0;

    return {
        text: result.text,
        language: result.language,
        duration: result.duration,
        processingTime: result.processingTime,
        model: result.model,
        segments: result.segments,
        confidenceScores,
        metadata: {
            averageConfidence,
            totalSegments: result.segments.length,
            totalWords: result.segments.reduce((sum, segment) => sum + countWords(segment), 0),
        },
    };
}

export class JsonFormat implements OutputFormat {
    readonly id = 'json' as const;
    readonly extension = '.json';

    render(result: TranscriptionResult): string {
        return JSON.stringify(toStructuredDocument(result), null, 2);
    }
}
