/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createHash } from 'node:crypto';
import { mkdtemp, mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import AdmZip from 'adm-zip';
import { c as createTar } from 'tar';
import type { IInstallJob } from '@homehub/types';
import type { IInstallerContext } from '../installers/installer.js';
import { UrlInstaller } from '../installers/url-installer.js';
import { LocalInstaller } from '../installers/local-installer.js';
import { SourceControlInstaller } from '../installers/source-control-installer.js';
import type { CommandOptions } from '../installers/command-runner.js';
import { ValidationError } from '../../../lib/errors.js';
import { createStubHttp } from '../../../tests/vitest/mocks/http.js';

const manifest = {
    name: 'lights',
    version: '1.0.0',
    runtimeMode: 'in-process',
    supportedModes: ['in-process']
};
const manifestText = JSON.stringify(manifest);

function job(installType: IInstallJob['installType'], payload: Record<string, unknown>): IInstallJob {
    return {
        id: 'job-1',
        pluginId: 'lights',
        action: 'install',
        installType,
        payload,
        status: 'sent',
        reason: null,
        error: null,
        installedVersion: null,
        logs: [],
        createdAt: new Date(),
        sentAt: new Date(),
        startedAt: null,
        finishedAt: null
    };
}

function context(): IInstallerContext & { lines: string[]; acknowledged: number } {
    const lines: string[] = [];
    const state = {
        lines,
        acknowledged: 0,
        signal: new AbortController().signal,
        acknowledge: async () => {
            state.acknowledged += 1;
        },
        log: (line: string) => {
            lines.push(line);
        }
    };
    return state;
}

// Bare-manifest downloads never touch the work directory.
const unusedWorkDir = path.join(tmpdir(), 'homehub-unused');

describe('UrlInstaller', () => {
    it('downloads and parses the manifest', async () => {
        const http = createStubHttp(() => ({ status: 200, data: Buffer.from(manifestText) }));
        const installer = new UrlInstaller(unusedWorkDir, http.client);
        const ctx = context();

        const result = await installer.install(job('url', { url: 'http://plugins.test/lights.json' }), ctx);

        expect(result.name).toBe('lights');
        expect(ctx.acknowledged).toBe(1);
        expect(http.requests[0]?.url).toBe('http://plugins.test/lights.json');
    });

    it('verifies a sha256 integrity digest', async () => {
        const digest = createHash('sha256').update(manifestText).digest('hex');
        const http = createStubHttp(() => ({ status: 200, data: Buffer.from(manifestText) }));
        const installer = new UrlInstaller(unusedWorkDir, http.client);
        const ctx = context();

        await installer.install(job('url', { url: 'http://plugins.test/lights.json', integrity: `sha256-${digest}` }), ctx);

        expect(ctx.lines).toEqual(['Fetching http://plugins.test/lights.json', 'Integrity verified']);
    });

    it('rejects a body that does not match the digest', async () => {
        const http = createStubHttp(() => ({ status: 200, data: Buffer.from(manifestText) }));
        const installer = new UrlInstaller(unusedWorkDir, http.client);

        await expect(
            installer.install(job('url', { url: 'http://plugins.test/lights.json', integrity: `sha256-${'0'.repeat(64)}` }), context())
        ).rejects.toThrow(/Integrity mismatch/);
    });

    it('reports a body that is not JSON as a manifest problem', async () => {
        const http = createStubHttp(() => ({ status: 200, data: Buffer.from('<html>') }));
        const installer = new UrlInstaller(unusedWorkDir, http.client);

        await expect(installer.install(job('url', { url: 'http://plugins.test/x' }), context())).rejects.toBeInstanceOf(ValidationError);
    });

    it('validates payloads', () => {
        const installer = new UrlInstaller(unusedWorkDir);

        expect(() => installer.validatePayload({ url: 'not a url' })).toThrow(ValidationError);
        expect(() => installer.validatePayload({ url: 'http://plugins.test/x', integrity: 'md5-abc' })).toThrow(ValidationError);
        expect(() => installer.validatePayload({ url: 'http://plugins.test/x' })).not.toThrow();
    });
});

describe('filesystem installers', () => {
    let root: string;

    beforeEach(async () => {
        root = await mkdtemp(path.join(tmpdir(), 'homehub-installer-'));
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    it('reads plugin.json from a local directory', async () => {
        const dir = path.join(root, 'lights');
        await mkdir(dir);
        await writeFile(path.join(dir, 'plugin.json'), manifestText);

        const result = await new LocalInstaller().install(job('local', { path: dir }), context());

        expect(result.version).toBe('1.0.0');
    });

    it('fails with a validation error when the manifest is invalid', async () => {
        await writeFile(path.join(root, 'plugin.json'), JSON.stringify({ ...manifest, runtimeMode: 'embedded' }));

        await expect(new LocalInstaller().install(job('local', { path: root }), context())).rejects.toBeInstanceOf(ValidationError);
    });

    it('shallow-clones the repository at the requested ref', async () => {
        const run = vi.fn(async (_command: string, args: string[], _options?: CommandOptions) => {
            const target = args[args.length - 1] ?? '';
            await mkdir(target, { recursive: true });
            await writeFile(path.join(target, 'plugin.json'), manifestText);
            return { stdout: '', stderr: '' };
        });
        const installer = new SourceControlInstaller(root, run);

        const result = await installer.install(job('source-control', { repository: 'https://git.test/lights.git', ref: 'v1.0.0' }), context());

        expect(result.name).toBe('lights');
        expect(run).toHaveBeenCalledWith(
            'git',
            ['clone', '--depth', '1', '--branch', 'v1.0.0', '--', 'https://git.test/lights.git', path.resolve(root, 'lights')],
            expect.objectContaining({ signal: expect.any(AbortSignal) })
        );

        await installer.remove('lights');
        expect(await readdir(root)).toEqual([]);
    });

    it('unpacks a gzipped tarball wrapped in a top-level directory', async () => {
        const source = path.join(root, 'src', 'lights-1.0.0');
        await mkdir(source, { recursive: true });
        await writeFile(path.join(source, 'plugin.json'), manifestText);
        const archive = path.join(root, 'lights.tgz');
        await createTar({ gzip: true, cwd: path.join(root, 'src'), file: archive }, ['lights-1.0.0']);
        const body = await readFile(archive);
        const digest = createHash('sha256').update(body).digest('hex');
        const workDir = path.join(root, 'plugins');
        const http = createStubHttp(() => ({ status: 200, data: body }));
        const installer = new UrlInstaller(workDir, http.client);
        const ctx = context();

        const result = await installer.install(
            job('url', { url: 'http://plugins.test/lights-1.0.0.tar.gz', integrity: `sha256-${digest}` }),
            ctx
        );

        expect(result.name).toBe('lights');
        expect(ctx.lines).toEqual([
            'Fetching http://plugins.test/lights-1.0.0.tar.gz',
            'Integrity verified',
            `Extracting tar archive into ${path.resolve(workDir, 'lights')}`
        ]);
        expect(await readFile(path.join(workDir, 'lights', 'lights-1.0.0', 'plugin.json'), 'utf8')).toBe(manifestText);
        expect(await readdir(workDir)).toEqual(['lights']);
    });

    it('unpacks a zip archive and removes it on uninstall', async () => {
        const zip = new AdmZip();
        zip.addFile('plugin.json', Buffer.from(manifestText));
        const workDir = path.join(root, 'plugins');
        const http = createStubHttp(() => ({ status: 200, data: zip.toBuffer() }));
        const installer = new UrlInstaller(workDir, http.client);

        const result = await installer.install(job('url', { url: 'http://plugins.test/lights.zip' }), context());

        expect(result.version).toBe('1.0.0');
        await installer.remove('lights');
        expect(await readdir(workDir)).toEqual([]);
    });

    it('rejects an archive without a manifest', async () => {
        const zip = new AdmZip();
        zip.addFile('README.md', Buffer.from('# lights'));
        const http = createStubHttp(() => ({ status: 200, data: zip.toBuffer() }));
        const installer = new UrlInstaller(path.join(root, 'plugins'), http.client);

        const failure = installer.install(job('url', { url: 'http://plugins.test/lights.zip' }), context());

        await expect(failure).rejects.toBeInstanceOf(ValidationError);
        await expect(failure).rejects.toThrow('Archive contains no plugin.json');
    });

    it('rejects refs that could be read as options', () => {
        const installer = new SourceControlInstaller(root);

        expect(() => installer.validatePayload({ repository: 'https://git.test/x.git', ref: '--upload-pack=x' })).toThrow(ValidationError);
    });
});
