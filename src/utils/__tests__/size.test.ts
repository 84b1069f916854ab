/**
 * Unit tests for size parsing and duration formatting
 */

import { describe, it, expect } from 'vitest';
import { parseSize, formatBytes, formatDuration } from '../size.js';

describe('parseSize', () => {
    it('should parse binary units', () => {
        expect(parseSize('10GB')).toBe(10 * 1024 ** 3);
        expect(parseSize('512MB')).toBe(512 * 1024 ** 2);
        expect(parseSize('64kb')).toBe(64 * 1024);
        expect(parseSize('1T')).toBe(1024 ** 4);
    });

    it('should accept plain byte counts and whitespace', () => {
        expect(parseSize('1048576')).toBe(1048576);
        expect(parseSize(' 2 GB ')).toBe(2 * 1024 ** 3);
        expect(parseSize('100B')).toBe(100);
    });

    it('should return null for anything else', () => {
        expect(parseSize('')).toBeNull();
        expect(parseSize('ten GB')).toBeNull();
        expect(parseSize('1.5GB')).toBeNull();
        expect(parseSize('10PB')).toBeNull();
    });
});

describe('formatBytes', () => {
    it('should keep small values in bytes', () => {
        expect(formatBytes(0)).toBe('0 bytes');
        expect(formatBytes(1023)).toBe('1023 bytes');
    });

    it('should use one decimal above a kilobyte', () => {
        expect(formatBytes(1536)).toBe('1.5 kB');
        expect(formatBytes(12 * 1024 ** 3)).toBe('12.0 GB');
        expect(formatBytes(3 * 1024 ** 4)).toBe('3.0 TB');
    });
});

describe('formatDuration', () => {
    it('should format milliseconds, seconds and minutes', () => {
        expect(formatDuration(850)).toBe('850ms');
        expect(formatDuration(12_340)).toBe('12.3s');
        expect(formatDuration(245_000)).toBe('4m 05s');
    });
});
