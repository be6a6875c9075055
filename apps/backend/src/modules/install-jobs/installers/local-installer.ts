import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { IInstallJob, IPluginManifest } from '@homehub/types';
import { ValidationError } from '../../../lib/errors.js';
import { parseManifest } from '../../plugins/manifest-schema.js';
import type { IInstaller, IInstallerContext } from './installer.js';
import { parsePayload } from './payload.js';

const localPayloadSchema = z.object({
    path: z.string().min(1)
});

export const MANIFEST_FILE = 'plugin.json';

/**
 * Read and validate `<dir>/plugin.json`.
 */
export async function readManifestFile(dir: string, signal?: AbortSignal): Promise<IPluginManifest> {
    const file = path.join(dir, MANIFEST_FILE);
    const content = await readFile(file, { encoding: 'utf8', signal });
    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch {
        throw new ValidationError(`${file} is not valid JSON`, { file });
    }
    return parseManifest(raw);
}

/**
 * Installs a plugin from a directory already on this host.
 */
export class LocalInstaller implements IInstaller {
    readonly type = 'local';

    validatePayload(payload: Record<string, unknown>): void {
        parsePayload(localPayloadSchema, payload, this.type);
    }

    async install(job: IInstallJob, context: IInstallerContext): Promise<IPluginManifest> {
        const payload = parsePayload(localPayloadSchema, job.payload, this.type);
        await context.acknowledge();
        const dir = path.resolve(payload.path);
        context.log(`Reading manifest from ${dir}`);
        return readManifestFile(dir, context.signal);
    }
}
