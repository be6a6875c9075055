import semver from 'semver';
import { z } from 'zod';
import type { IPluginManifest } from '@homehub/types';
import { ValidationError } from '../../lib/errors.js';

const runtimeModeSchema = z.enum(['in-process', 'microservice', 'hybrid', 'embedded']);

const configFieldSchema = z.object({
    type: z.enum(['string', 'number', 'boolean', 'select']),
    label: z.string().optional(),
    required: z.boolean().optional(),
    default: z.union([z.string(), z.number(), z.boolean()]).optional(),
    secret: z.boolean().optional(),
    options: z.array(z.object({ value: z.string(), label: z.string().optional() })).optional()
});

const dependencySchema = z.object({
    plugin: z.string().min(1),
    version: z
        .string()
        .refine(range => semver.validRange(range) !== null, { message: 'Invalid semver range' })
        .optional(),
    type: z.enum(['required', 'optional', 'conflicts'])
});

export const pluginManifestSchema = z
    .object({
        name: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'Plugin name must be a lowercase slug'),
        version: z.string().refine(version => semver.valid(version) !== null, { message: 'Invalid semver version' }),
        description: z.string().optional(),
        publisher: z.string().optional(),
        runtimeMode: runtimeModeSchema,
        supportedModes: z.array(runtimeModeSchema).min(1),
        modeSwitchSupported: z.boolean().default(false),
        configSchema: z.record(configFieldSchema).optional(),
        dependencies: z.array(dependencySchema).optional(),
        service: z
            .object({
                baseUrl: z.string().url(),
                command: z.string().optional(),
                args: z.array(z.string()).optional(),
                env: z.record(z.string()).optional()
            })
            .optional(),
        localOperations: z.array(z.string()).optional()
    })
    .refine(manifest => manifest.supportedModes.includes(manifest.runtimeMode), {
        message: 'runtimeMode must be one of supportedModes',
        path: ['runtimeMode']
    })
    .refine(manifest => new Set(manifest.supportedModes).size === manifest.supportedModes.length, {
        message: 'supportedModes must not repeat',
        path: ['supportedModes']
    });

/**
 * Validate a raw `plugin.json` document.
 *
 * @throws ValidationError listing every issue
 */
export function parseManifest(raw: unknown): IPluginManifest {
    const result = pluginManifestSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ValidationError(`Invalid plugin manifest: ${issues.join('; ')}`, { issues });
    }
    const manifest: IPluginManifest = result.data;
    return manifest;
}
