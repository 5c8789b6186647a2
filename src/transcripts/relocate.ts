/**
 * Move processed sources out of the input directory without ever
 * overwriting something already at the destination.
 */

import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import * as path from 'path';
import { hasErrorCode } from '../shared/errors';

const MAX_SUFFIX = 10_000;

/** name.ext, name_1.ext, name_2.ext, ... */
export function candidateName(fileName: string, attempt: number): string {
    if (attempt === 0) return fileName;
    const ext = path.extname(fileName);
    const stem = fileName.slice(0, fileName.length - ext.length);
    return `${stem}_${attempt}${ext}`;
}

/**
 * Claim destPath for source. link() and COPYFILE_EXCL both fail with EEXIST
 * instead of replacing an existing file.
 */
async function claim(source: string, destPath: string): Promise<void> {
    try {
        await fs.link(source, destPath);
    } catch (error) {
        if (hasErrorCode(error, 'EXDEV') || hasErrorCode(error, 'EPERM') || hasErrorCode(error, 'ENOTSUP')) {
            await fs.copyFile(source, destPath, fsConstants.COPYFILE_EXCL);
            return;
        }
        throw error;
    }
}

/**
 * Move source into destDir, suffixing the name on collision.
 * @returns the final destination path
 */
export async function relocateFile(source: string, destDir: string): Promise<string> {
    await fs.mkdir(destDir, { recursive: true });
    const fileName = path.basename(source);

    for (let attempt = 0; attempt < MAX_SUFFIX; attempt++) {
        const destPath = path.join(destDir, candidateName(fileName, attempt));
        try {
            await claim(source, destPath);
        } catch (error) {
            if (hasErrorCode(error, 'EEXIST')) continue;
            throw error;
        }

        await fs.unlink(source);
        return destPath;
    }

    throw new Error(`No free name for ${fileName} in ${destDir}`);
}
