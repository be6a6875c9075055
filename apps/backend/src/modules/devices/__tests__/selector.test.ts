/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import type { IDevice } from '@homehub/types';
import { compileSelector } from '../selector.js';
import { ValidationError } from '../../../lib/errors.js';

function device(overrides: Partial<IDevice> = {}): IDevice {
    return {
        id: 'lamp-1',
        name: 'Kitchen lamp',
        type: 'light',
        room: 'kitchen',
        attributes: { vendor: 'acme-labs', protocol: 'zigbee' },
        isOnline: true,
        isOn: false,
        state: {},
        lastSeen: null,
        updatedAt: new Date(0),
        ...overrides
    };
}

describe('compileSelector', () => {
    it('requires every clause to match', () => {
        const selector = compileSelector('type=light, room=kitchen');

        expect(selector.matches(device())).toBe(true);
        expect(selector.matches(device({ room: 'hall' }))).toBe(false);
        expect(selector.source).toBe('type=light, room=kitchen');
    });

    it('matches attribute globs', () => {
        const selector = compileSelector('attributes.vendor=acme*');

        expect(selector.matches(device())).toBe(true);
        expect(selector.matches(device({ attributes: { vendor: 'other' } }))).toBe(false);
        expect(selector.matches(device({ attributes: {} }))).toBe(false);
    });

    it('treats a bare * as match-all', () => {
        expect(compileSelector('*').matches(device({ type: 'lock', room: null }))).toBe(true);
    });

    it('never matches a null room', () => {
        expect(compileSelector('room=*').matches(device({ room: null }))).toBe(false);
    });

    it('escapes regex characters in values', () => {
        expect(compileSelector('name=Kitchen.lamp').matches(device())).toBe(false);
        expect(compileSelector('name=Kitchen lamp').matches(device())).toBe(true);
    });

    it('rejects keys inherited from Object.prototype', () => {
        expect(() => compileSelector('toString=*')).toThrow(ValidationError);
        expect(() => compileSelector('constructor=x')).toThrow(ValidationError);
    });

    it('does not read inherited attribute names', () => {
        expect(compileSelector('attributes.toString=*').matches(device())).toBe(false);
        expect(compileSelector('attributes.vendor=acme*').matches(device())).toBe(true);
    });

    it('rejects unknown keys and empty clauses', () => {
        expect(() => compileSelector('color=red')).toThrow(ValidationError);
        expect(() => compileSelector('type')).toThrow(ValidationError);
        expect(() => compileSelector('type=')).toThrow(ValidationError);
        expect(() => compileSelector('type=light,')).toThrow(ValidationError);
    });
});
