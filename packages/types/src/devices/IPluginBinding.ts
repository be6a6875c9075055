/**
 * Claim of a plugin over the set of devices matched by `selector`.
 *
 * Selectors are comma-separated `key=value` clauses that must all match, with
 * `*` globs in values. Keys address `id`, `name`, `type`, `room` or
 * `attributes.<name>`. A bare `*` matches every device.
 *
 * @example 'type=light,room=kitchen'
 * @example 'attributes.vendor=acme*'
 */
export interface IPluginBinding {
    id: string;
    pluginId: string;
    selector: string;
    createdAt: Date;
}
