import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ClientError } from '../../errors.js';
import { decrypt, deriveKey, encrypt, generateEncryptionKey, isEncrypted } from '../crypto.service.js';
import { silenceConsole } from './fetch-stub.js';

describe('crypto.service', () => {
    beforeEach(() => {
        silenceConsole();
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('uses a 64-hex key as raw bytes', () => {
        const hex = 'ab'.repeat(32);
        expect(deriveKey(hex).toString('hex')).toBe(hex);
    });

    it('hashes any other secret to 32 bytes', () => {
        expect(deriveKey('test-secret')).toHaveLength(32);
    });

    it('round-trips text in iv:tag:cipher format', () => {
        const key = deriveKey(generateEncryptionKey());
        const encrypted = encrypt('{"username":"apod_daily"}', key);

        expect(encrypted.split(':')).toHaveLength(3);
        expect(isEncrypted(encrypted)).toBe(true);
        expect(decrypt(encrypted, key)).toBe('{"username":"apod_daily"}');
    });

    it('does not mistake JSON for ciphertext', () => {
        expect(isEncrypted('{"username":"apod_daily"}')).toBe(false);
    });

    it('fails with a ClientError under the wrong key', () => {
        const encrypted = encrypt('secret session', deriveKey(generateEncryptionKey()));

        expect(() => decrypt(encrypted, deriveKey(generateEncryptionKey()))).toThrow(ClientError);
    });
});
