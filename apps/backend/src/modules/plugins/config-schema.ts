import { z } from 'zod';
import type { IConfigField, IConfigSchema, PluginConfig } from '@homehub/types';
import { ValidationError } from '../../lib/errors.js';

export type ConfigParseResult =
    | { success: true; data: PluginConfig }
    | { success: false; issues: string[] };

/**
 * Validator compiled from a plugin's declared configuration schema.
 */
export interface ICompiledConfigSchema {
    /** Full validation: required fields, types, select options, unknown keys */
    parse(config: unknown): ConfigParseResult;
    /** Values of every field that declares a default */
    defaults(): PluginConfig;
    /** Names of fields marked secret */
    readonly secretFields: string[];
}

function fieldSchema(name: string, field: IConfigField): z.ZodTypeAny {
    const fallback = field.default;
    const mismatch = () => new ValidationError(`Default for config field "${name}" does not match type ${field.type}`, { name });

    let schema: z.ZodTypeAny;
    switch (field.type) {
        case 'string':
            if (fallback !== undefined && typeof fallback !== 'string') {
                throw mismatch();
            }
            schema = fallback !== undefined ? z.string().default(fallback) : z.string();
            break;
        case 'number':
            if (fallback !== undefined && typeof fallback !== 'number') {
                throw mismatch();
            }
            schema = fallback !== undefined ? z.number().default(fallback) : z.number();
            break;
        case 'boolean':
            if (fallback !== undefined && typeof fallback !== 'boolean') {
                throw mismatch();
            }
            schema = fallback !== undefined ? z.boolean().default(fallback) : z.boolean();
            break;
        case 'select': {
            const allowed = (field.options ?? []).map(option => option.value);
            if (allowed.length === 0) {
                throw new ValidationError(`Select config field "${name}" declares no options`, { name });
            }
            if (fallback !== undefined && (typeof fallback !== 'string' || !allowed.includes(fallback))) {
                throw mismatch();
            }
            const select = z.string().refine(value => allowed.includes(value), {
                message: `Expected one of: ${allowed.join(', ')}`
            });
            schema = fallback !== undefined ? select.default(fallback) : select;
            break;
        }
        default:
            throw new ValidationError(`Config field "${name}" has an unknown type`, { name });
    }

    return fallback === undefined && !field.required ? schema.optional() : schema;
}

/**
 * Compile a declared schema into a zod validator.
 *
 * Throws `ValidationError` when the schema itself is inconsistent, e.g. a
 * default of the wrong type.
 */
export function compileConfigSchema(schema: IConfigSchema): ICompiledConfigSchema {
    const shape: Record<string, z.ZodTypeAny> = {};
    for (const [name, field] of Object.entries(schema)) {
        shape[name] = fieldSchema(name, field);
    }
    const validator = z.object(shape).strict();

    return {
        parse(config: unknown): ConfigParseResult {
            const result = validator.safeParse(config ?? {});
            if (result.success) {
                return { success: true, data: { ...result.data } };
            }
            return {
                success: false,
                issues: result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            };
        },
        defaults(): PluginConfig {
            const values: PluginConfig = {};
            for (const [name, field] of Object.entries(schema)) {
                if (field.default !== undefined) {
                    values[name] = field.default;
                }
            }
            return values;
        },
        secretFields: Object.entries(schema)
            .filter(([, field]) => field.secret === true)
            .map(([name]) => name)
    };
}

/**
 * Copy of `config` with secret fields masked, for logs.
 */
export function redactConfig(config: PluginConfig, secretFields: string[]): PluginConfig {
    const copy: PluginConfig = { ...config };
    for (const name of secretFields) {
        if (name in copy) {
            copy[name] = '***';
        }
    }
    return copy;
}
