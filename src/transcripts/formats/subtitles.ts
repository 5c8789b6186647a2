/**
 * SubRip and WebVTT renderers
 */

import { TimedSegment, TranscriptionResult } from '../types';
import { formatSrtTimestamp, formatVttTimestamp } from './timestamps';
import type { OutputFormat } from './index';

function renderCues(segments: TimedSegment[], stamp: (seconds: number) => string, numbered: boolean): string {
    return segments
        .map((segment, i) => {
            const id = numbered ? `${i + 1}\n` : '';
            return `${id}${stamp(segment.start)} --> ${stamp(segment.end)}\n${segment.text.trim()}\n\n`;
        })
        .join('');
}

export class SrtFormat implements OutputFormat {
    readonly id = 'srt' as const;
    readonly extension = '.srt';

    render(result: TranscriptionResult): string {
        return renderCues(result.segments, formatSrtTimestamp, true);
    }
}

/** Cues carry no identifiers, only timings and text */
export class VttFormat implements OutputFormat {
    readonly id = 'vtt' as const;
    readonly extension = '.vtt';

    render(result: TranscriptionResult): string {
        return `WEBVTT\n\n${renderCues(result.segments, formatVttTimestamp, false)}`;
    }
}
