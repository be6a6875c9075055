import { access, readdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import AdmZip from 'adm-zip';
import { x as extractTar } from 'tar';
import { ValidationError } from '../../../lib/errors.js';
import { MANIFEST_FILE } from './local-installer.js';

export type ArchiveFormat = 'zip' | 'tar';

/**
 * Archive format from the URL's file name, then from the content type.
 * `null` means the body is a bare manifest.
 */
export function detectArchiveFormat(url: string, contentType?: string): ArchiveFormat | null {
    const name = new URL(url).pathname.toLowerCase();
    if (name.endsWith('.zip')) {
        return 'zip';
    }
    if (name.endsWith('.tar.gz') || name.endsWith('.tgz') || name.endsWith('.tar')) {
        return 'tar';
    }
    const type = (contentType ?? '').toLowerCase();
    if (type.includes('zip') && !type.includes('gzip')) {
        return 'zip';
    }
    if (type.includes('gzip') || type.includes('x-tar')) {
        return 'tar';
    }
    return null;
}

/**
 * Unpack `body` into `target`, which must already exist and be empty.
 * Entries resolving outside `target` fail the whole extraction.
 */
export async function extractArchive(body: Buffer, format: ArchiveFormat, target: string): Promise<void> {
    if (format === 'zip') {
        let zip: AdmZip;
        try {
            zip = new AdmZip(body);
        } catch (error) {
            throw new ValidationError(`Corrupt zip archive: ${error instanceof Error ? error.message : String(error)}`);
        }
        for (const entry of zip.getEntries()) {
            assertInside(target, entry.entryName);
        }
        zip.extractAllTo(target, true);
        return;
    }

    const file = `${target}.download`;
    await writeFile(file, body);
    try {
        // Absolute and `..` entry paths are stripped by tar unless preservePaths is set.
        await extractTar({ file, cwd: target, strict: true });
    } catch (error) {
        throw new ValidationError(`Corrupt tar archive: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
        await rm(file, { force: true });
    }
}

/**
 * Directory holding `plugin.json`: the extraction root, or the single
 * top-level directory archives are commonly wrapped in.
 */
export async function locateManifestDir(root: string): Promise<string> {
    if (await exists(path.join(root, MANIFEST_FILE))) {
        return root;
    }
    const entries = await readdir(root, { withFileTypes: true });
    const [only] = entries;
    if (entries.length === 1 && only?.isDirectory() && (await exists(path.join(root, only.name, MANIFEST_FILE)))) {
        return path.join(root, only.name);
    }
    throw new ValidationError(`Archive contains no ${MANIFEST_FILE}`);
}

function assertInside(root: string, entryName: string): void {
    const resolved = path.resolve(root, entryName);
    if (resolved !== root && !resolved.startsWith(`${root}${path.sep}`)) {
        throw new ValidationError(`Archive entry escapes the plugin directory: ${entryName}`, { entry: entryName });
    }
}

async function exists(file: string): Promise<boolean> {
    try {
        await access(file);
        return true;
    } catch {
        return false;
    }
}
