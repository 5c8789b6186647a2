/**
 * Media discovery
 *
 * Walks the input root and returns candidate files in a fixed order
 * (sorted by normalized absolute path), whatever order the filesystem
 * hands entries back in.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createHash } from 'crypto';
import { NotADirectoryError, NotFoundError, hasErrorCode, toErrorMessage } from '../shared/errors';
import { logWarn } from '../scheduler/logger';
import { SUPPORTED_MEDIA_EXTENSIONS } from './constants';
import { WorkItem } from './types';

export interface ScanOptions {
    recursive?: boolean;
    extensions?: readonly string[];
}

export interface ExtensionSummary {
    count: number;
    size: number;
}

export interface WorkItemSummary {
    totalFiles: number;
    totalSize: number;
    byExtension: Record<string, ExtensionSummary>;
}

/**
 * Stable identity for a source file: md5 of "<absolute path>_<mtime ms>"
 */
export function fileIdentity(absolutePath: string, mtimeMs: number): string {
    return createHash('md5').update(`${absolutePath}_${mtimeMs}`, 'utf-8').digest('hex');
}

/**
 * Forward-slash form used for ordering and relative paths
 */
export function normalizePath(filePath: string): string {
    return filePath.split(path.sep).join('/');
}

function compareNormalized(a: WorkItem, b: WorkItem): number {
    const left = normalizePath(a.path);
    const right = normalizePath(b.path);
    if (left < right) return -1;
    if (left > right) return 1;
    return 0;
}

async function assertDirectory(root: string): Promise<void> {
    try {
        const stats = await fs.stat(root);
        if (!stats.isDirectory()) {
            throw new NotADirectoryError(`Input path is not a directory: ${root}`);
        }
    } catch (error) {
        if (hasErrorCode(error, 'ENOENT')) {
            throw new NotFoundError(`Input directory does not exist: ${root}`);
        }
        throw error;
    }
}

/** Symlinks count when they resolve to a regular file; linked directories are not walked */
async function isLinkedFile(linkPath: string): Promise<boolean> {
    try {
        return (await fs.stat(linkPath)).isFile();
    } catch (error) {
        logWarn(`Skipping unreadable link ${linkPath}: ${toErrorMessage(error)}`, 'discovery');
        return false;
    }
}

async function collectFiles(dir: string, recursive: boolean, out: string[]): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            if (recursive) {
                await collectFiles(fullPath, recursive, out);
            }
        } else if (entry.isFile()) {
            out.push(fullPath);
        } else if (entry.isSymbolicLink() && await isLinkedFile(fullPath)) {
            out.push(fullPath);
        }
    }
}

/**
 * Find all supported media files under root
 */
export async function scan(root: string, options: ScanOptions = {}): Promise<WorkItem[]> {
    const absoluteRoot = path.resolve(root);
    const recursive = options.recursive ?? true;
    const allowed = new Set((options.extensions ?? SUPPORTED_MEDIA_EXTENSIONS).map(ext => ext.toLowerCase()));

    await assertDirectory(absoluteRoot);

    const files: string[] = [];
    await collectFiles(absoluteRoot, recursive, files);

    const items: WorkItem[] = [];
    for (const filePath of files) {
        if (!allowed.has(path.extname(filePath).toLowerCase())) continue;

        const stats = await fs.stat(filePath);
        items.push({
            path: filePath,
            relativePath: normalizePath(path.relative(absoluteRoot, filePath)),
            size: stats.size,
            mtimeMs: stats.mtimeMs,
            identity: fileIdentity(filePath, stats.mtimeMs),
        });
    }

    return items.sort(compareNormalized);
}

/**
 * Count and size per extension, for the run header
 */
export function summarizeWorkItems(items: readonly WorkItem[]): WorkItemSummary {
    const byExtension: Record<string, ExtensionSummary> = {};
    let totalSize = 0;

    for (const item of items) {
        const ext = path.extname(item.path).toLowerCase();
        if (!byExtension[ext]) {
            byExtension[ext] = { count: 0, size: 0 };
        }
        byExtension[ext].count++;
        byExtension[ext].size += item.size;
        totalSize += item.size;
    }

    return { totalFiles: items.length, totalSize, byExtension };
}
