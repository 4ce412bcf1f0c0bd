import { describe, it, expect } from 'vitest';
import { extractEmail } from '../classify/email.js';

describe('extractEmail', () => {
    it('should return the first address in left-to-right order', () => {
        expect(extractEmail('contact: a@b.com; also c@d.org')).toBe('a@b.com');
    });

    it('should drop trailing sentence punctuation and keep case', () => {
        expect(extractEmail('Pfizer Inc, New York, USA. Electronic address: Jane.Doe@Pfizer.com.')).toBe('Jane.Doe@Pfizer.com');
    });

    it('should accept multi-part domains', () => {
        expect(extractEmail('Write to john.smith@mail.example.co.uk for data')).toBe('john.smith@mail.example.co.uk');
    });

    it('should require a dot after the @', () => {
        expect(extractEmail('root@localhost')).toBeNull();
        expect(extractEmail('user@domain.c')).toBeNull();
    });

    it('should return null without an address', () => {
        expect(extractEmail('Harvard University, Boston, MA')).toBeNull();
        expect(extractEmail('')).toBeNull();
    });

    it('should treat non-strings as empty', () => {
        expect(extractEmail(undefined)).toBeNull();
        expect(extractEmail(null)).toBeNull();
        expect(extractEmail(42)).toBeNull();
    });

    it('should be idempotent', () => {
        const first = extractEmail('Corresponding author: r.lee@acmetx.com');
        expect(first).toBe('r.lee@acmetx.com');
        expect(extractEmail(first)).toBe(first);
    });
});
