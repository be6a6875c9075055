import type { IDevice } from '@homehub/types';
import { ValidationError } from '../../lib/errors.js';

/**
 * Compiled binding selector.
 */
export interface IDeviceSelector {
    readonly source: string;
    matches(device: IDevice): boolean;
}

type FieldReader = (device: IDevice) => string | null;

const FIELD_READERS = new Map<string, FieldReader>([
    ['id', device => device.id],
    ['name', device => device.name],
    ['type', device => device.type],
    ['room', device => device.room]
]);

function readerFor(key: string): FieldReader | null {
    if (key.startsWith('attributes.') && key.length > 'attributes.'.length) {
        const attribute = key.slice('attributes.'.length);
        return device => (Object.hasOwn(device.attributes, attribute) ? device.attributes[attribute] : null);
    }
    return FIELD_READERS.get(key) ?? null;
}

function globToRegExp(glob: string): RegExp {
    const escaped = glob.split('*').map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'));
    return new RegExp(`^${escaped.join('.*')}$`);
}

/**
 * Parse a selector such as `type=light,room=kitchen` or `attributes.vendor=acme*`.
 *
 * Every clause must match. A bare `*` matches all devices.
 */
export function compileSelector(selector: string): IDeviceSelector {
    const source = selector.trim();
    if (source === '*') {
        return { source, matches: () => true };
    }

    const clauses = source.split(',').map(clause => clause.trim());
    const predicates = clauses.map(clause => {
        const separator = clause.indexOf('=');
        const key = separator > 0 ? clause.slice(0, separator).trim() : '';
        const value = separator > 0 ? clause.slice(separator + 1).trim() : '';
        const read = readerFor(key);
        if (!read || value === '') {
            throw new ValidationError(`Invalid selector clause "${clause}" in "${selector}"`, { selector, clause });
        }
        const pattern = globToRegExp(value);
        return (device: IDevice) => {
            const actual = read(device);
            return actual !== null && pattern.test(actual);
        };
    });

    return {
        source,
        matches: device => predicates.every(predicate => predicate(device))
    };
}
