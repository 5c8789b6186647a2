/**
 * Where artifacts go: mirrored output paths and per-item temp audio
 */

import * as path from 'path';
import { WorkItem } from './types';

const INVALID_CHARS = /[<>:"/\\|?*\u0000-\u001f\u007f]/g;
const RESERVED_NAMES = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])(\..*)?$/i;

/**
 * Make one path segment safe to use as a filename on any platform
 */
export function sanitizeSegment(segment: string): string {
    let cleaned = segment.replace(INVALID_CHARS, '').replace(/[. ]+$/, '');
    if (RESERVED_NAMES.test(cleaned)) {
        cleaned = `_${cleaned}`;
    }
    return cleaned === '' ? '_' : cleaned;
}

/**
 * Output file for an item: same relative location under outputRoot,
 * extension swapped, every segment sanitized
 */
export function outputPathFor(item: WorkItem, outputRoot: string, extension: string): string {
    const segments = item.relativePath.split('/');
    const fileName = segments.pop() ?? '';
    const stem = fileName.slice(0, fileName.length - path.extname(fileName).length);

    const dirs = segments.map(sanitizeSegment);
    const name = `${sanitizeSegment(stem)}${extension}`;
    return path.join(outputRoot, ...dirs, name);
}

/**
 * Per-item temp audio file; unique per identity
 */
export function tempAudioPathFor(item: WorkItem, tempAudioDir: string): string {
    const stem = path.basename(item.path, path.extname(item.path));
    return path.join(tempAudioDir, `${sanitizeSegment(stem)}_${item.identity.slice(0, 8)}.wav`);
}

/** Sidecar path for the detailed JSON next to the main output */
export function detailedJsonPathFor(outputPath: string): string {
    const ext = path.extname(outputPath);
    const base = outputPath.slice(0, outputPath.length - ext.length);
    return ext === '.json' ? `${base}.detailed.json` : `${base}.json`;
}
