import { TranscriptionResult } from '../types';
import { formatClock } from './timestamps';
import type { OutputFormat } from './index';

export interface TextFormatOptions {
    /** One `[HH:MM:SS --> HH:MM:SS] text` line per segment */
    includeTimestamps: boolean;
}

export class TextFormat implements OutputFormat {
    readonly id = 'txt' as const;
    readonly extension = '.txt';

    constructor(private readonly options: TextFormatOptions = { includeTimestamps: false }) {}

    render(result: TranscriptionResult): string {
        if (this.options.includeTimestamps && result.segments.length > 0) {
            return result.segments
                .map(segment => `[${formatClock(segment.start)} --> ${formatClock(segment.end)}] ${segment.text.trim()}\n`)
                .join('');
        }

        return result.text.endsWith('\n') ? result.text : `${result.text}\n`;
    }
}
