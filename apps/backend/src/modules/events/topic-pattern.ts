import { ValidationError } from '../../lib/errors.js';

/**
 * Compiled topic pattern.
 *
 * `*` matches exactly one dot-delimited segment. A trailing `**` matches one or
 * more remaining segments.
 */
export interface ITopicPattern {
    readonly source: string;
    matches(topic: string): boolean;
}

const SEGMENT_RE = /^[A-Za-z0-9_:-]+$/;

export function assertValidTopic(topic: string): void {
    const segments = topic.split('.');
    if (!topic || segments.some(segment => !SEGMENT_RE.test(segment))) {
        throw new ValidationError(`Invalid event topic: "${topic}"`, { topic });
    }
}

export function compileTopicPattern(pattern: string): ITopicPattern {
    const segments = pattern.split('.');
    const valid = pattern.length > 0 && segments.every((segment, index) => {
        if (segment === '*') {
            return true;
        }
        if (segment === '**') {
            return index === segments.length - 1;
        }
        return SEGMENT_RE.test(segment);
    });
    if (!valid) {
        throw new ValidationError(`Invalid topic pattern: "${pattern}"`, { pattern });
    }

    const tailWildcard = segments[segments.length - 1] === '**';
    const fixed = tailWildcard ? segments.slice(0, -1) : segments;

    return {
        source: pattern,
        matches(topic: string): boolean {
            const parts = topic.split('.');
            if (tailWildcard ? parts.length <= fixed.length : parts.length !== fixed.length) {
                return false;
            }
            return fixed.every((segment, index) => segment === '*' || segment === parts[index]);
        }
    };
}
