import { createHash } from 'node:crypto';
import { mkdir, rm } from 'node:fs/promises';
import path from 'node:path';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { IInstallJob, IPluginManifest } from '@homehub/types';
import { ValidationError } from '../../../lib/errors.js';
import { createHttpClient } from '../../../lib/http-client.js';
import { parseManifest } from '../../plugins/manifest-schema.js';
import { detectArchiveFormat, extractArchive, locateManifestDir } from './archive.js';
import type { IInstaller, IInstallerContext } from './installer.js';
import { readManifestFile } from './local-installer.js';
import { parsePayload } from './payload.js';

const urlPayloadSchema = z.object({
    url: z.string().url(),
    integrity: z
        .string()
        .regex(/^sha256-[0-9a-f]{64}$/i, 'Expected sha256-<hex>')
        .optional()
});

/**
 * Downloads a plugin over HTTP, checking an optional sha256 digest of the raw
 * body first.
 *
 * A `.zip`, `.tar.gz` or `.tgz` download is unpacked into
 * `<workDir>/<pluginId>` and its `plugin.json` read from there; any other body
 * is taken as the manifest itself.
 */
export class UrlInstaller implements IInstaller {
    readonly type = 'url';
    private readonly http: AxiosInstance;

    constructor(
        private readonly workDir: string,
        http?: AxiosInstance
    ) {
        this.http = http ?? createHttpClient({ timeout: 60000 });
    }

    validatePayload(payload: Record<string, unknown>): void {
        parsePayload(urlPayloadSchema, payload, this.type);
    }

    async install(job: IInstallJob, context: IInstallerContext): Promise<IPluginManifest> {
        const { url, integrity } = parsePayload(urlPayloadSchema, job.payload, this.type);
        await context.acknowledge();
        context.log(`Fetching ${url}`);

        const response = await this.http.get<ArrayBuffer>(url, { responseType: 'arraybuffer', signal: context.signal });
        const body = Buffer.from(response.data);

        if (integrity) {
            const expected = integrity.slice('sha256-'.length).toLowerCase();
            const actual = createHash('sha256').update(body).digest('hex');
            if (actual !== expected) {
                throw new Error(`Integrity mismatch for ${url}: expected ${expected}, got ${actual}`);
            }
            context.log('Integrity verified');
        }

        const contentType = response.headers['content-type'];
        const format = detectArchiveFormat(url, typeof contentType === 'string' ? contentType : undefined);
        if (format) {
            const target = this.pluginDir(job.pluginId);
            await rm(target, { recursive: true, force: true });
            await mkdir(target, { recursive: true });
            context.log(`Extracting ${format} archive into ${target}`);
            await extractArchive(body, format, target);
            return readManifestFile(await locateManifestDir(target), context.signal);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(body.toString('utf8'));
        } catch {
            throw new ValidationError(`Manifest at ${url} is not valid JSON`);
        }
        return parseManifest(raw);
    }

    async remove(pluginId: string): Promise<void> {
        await rm(this.pluginDir(pluginId), { recursive: true, force: true });
    }

    private pluginDir(pluginId: string): string {
        return path.resolve(this.workDir, pluginId);
    }
}
