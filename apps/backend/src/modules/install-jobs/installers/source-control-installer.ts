import { mkdir, rm } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { IInstallJob, IPluginManifest } from '@homehub/types';
import type { IInstaller, IInstallerContext } from './installer.js';
import { runCommand, type CommandRunner } from './command-runner.js';
import { readManifestFile } from './local-installer.js';
import { parsePayload } from './payload.js';

const sourceControlPayloadSchema = z.object({
    repository: z.string().min(1),
    ref: z
        .string()
        .regex(/^[\w./-]+$/, 'Invalid ref')
        .optional()
});

/**
 * Shallow-clones a git repository into the plugin work directory and reads
 * the manifest at its root. Each install replaces the previous checkout.
 */
export class SourceControlInstaller implements IInstaller {
    readonly type = 'source-control';

    constructor(
        private readonly workDir: string,
        private readonly run: CommandRunner = runCommand
    ) {}

    validatePayload(payload: Record<string, unknown>): void {
        parsePayload(sourceControlPayloadSchema, payload, this.type);
    }

    async install(job: IInstallJob, context: IInstallerContext): Promise<IPluginManifest> {
        const { repository, ref } = parsePayload(sourceControlPayloadSchema, job.payload, this.type);
        await context.acknowledge();

        const target = this.checkoutDir(job.pluginId);
        await rm(target, { recursive: true, force: true });
        await mkdir(path.dirname(target), { recursive: true });

        const args = ['clone', '--depth', '1', ...(ref ? ['--branch', ref] : []), '--', repository, target];
        context.log(`git ${args.join(' ')}`);
        await this.run('git', args, { signal: context.signal });

        return readManifestFile(target, context.signal);
    }

    async remove(pluginId: string): Promise<void> {
        await rm(this.checkoutDir(pluginId), { recursive: true, force: true });
    }

    private checkoutDir(pluginId: string): string {
        return path.resolve(this.workDir, pluginId);
    }
}
