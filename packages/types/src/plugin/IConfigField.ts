/**
 * Primitive kinds a plugin configuration field may declare.
 */
export type ConfigFieldType = 'string' | 'number' | 'boolean' | 'select';

/**
 * Allowed value of a `select` configuration field.
 */
export interface IConfigSelectOption {
    value: string;
    label?: string;
}

/**
 * One declared configuration field of a plugin.
 *
 * A plugin's configuration schema is a record of these keyed by field name.
 * The registry compiles it into a validator and rejects any config that does
 * not satisfy it.
 */
export interface IConfigField {
    type: ConfigFieldType;
    /** Human-readable label */
    label?: string;
    /** Config is rejected when a required field without default is missing */
    required?: boolean;
    /** Applied when the field is absent */
    default?: string | number | boolean;
    /** Masked in logs and snapshots handed to other plugins */
    secret?: boolean;
    /** Allowed values for `select` fields */
    options?: IConfigSelectOption[];
}

/**
 * Configuration schema keyed by field name.
 */
export type IConfigSchema = Record<string, IConfigField>;

/**
 * Opaque structured configuration owned by a plugin.
 */
export type PluginConfig = Record<string, unknown>;
