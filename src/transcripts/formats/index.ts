/**
 * Output formats
 *
 * A closed set of renderers behind one interface. Adding a format means
 * adding its id here and a case in createOutputFormat.
 */

import { TranscriptionResult } from '../types';
import { TextFormat } from './text';
import { SrtFormat, VttFormat } from './subtitles';
import { JsonFormat } from './structured';

export const OUTPUT_FORMAT_IDS = ['txt', 'srt', 'vtt', 'json'] as const;

export type OutputFormatId = typeof OUTPUT_FORMAT_IDS[number];

export interface OutputFormat {
    readonly id: OutputFormatId;

    /** Including the leading dot */
    readonly extension: string;

    render(result: TranscriptionResult): string;
}

export interface OutputFormatOptions {
    includeTimestamps?: boolean;
}

export function createOutputFormat(id: OutputFormatId, options: OutputFormatOptions = {}): OutputFormat {
    switch (id) {
        case 'txt':
            return new TextFormat({ includeTimestamps: options.includeTimestamps ?? false });
        case 'srt':
            return new SrtFormat();
        case 'vtt':
            return new VttFormat();
        case 'json':
            return new JsonFormat();
    }
}

export { TextFormat, SrtFormat, VttFormat, JsonFormat };
export { formatClock, formatSrtTimestamp, formatVttTimestamp } from './timestamps';
