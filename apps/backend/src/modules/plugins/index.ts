export { PluginRegistry } from './plugin-registry.js';
export type { IPluginRegistryDependencies, BindingCountProbe } from './plugin-registry.js';
export { PluginCatalog } from './plugin-catalog.js';
export type { PluginFactory } from './plugin-catalog.js';
export { checkLoadable, resolveLoadOrder } from './dependency-resolver.js';
export { compileConfigSchema, redactConfig } from './config-schema.js';
export type { ICompiledConfigSchema, ConfigParseResult } from './config-schema.js';
export { parseManifest, pluginManifestSchema } from './manifest-schema.js';
