// ============================================================================
// Crypto Service — AES-256-GCM for the Instagram session file
// ============================================================================
// The session file holds live Instagram cookies. When SESSION_ENCRYPTION_KEY
// is set the file is stored encrypted, in the format iv:authTag:ciphertext
// (all hex).
// ============================================================================

import crypto from 'crypto';
import { ClientError } from '../errors.js';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;       // 128 bits
const TAG_LENGTH = 16;      // 128 bits
const KEY_LENGTH = 32;      // 256 bits

/**
 * Turns SESSION_ENCRYPTION_KEY into a 32-byte key.
 * 64 hex characters are used as-is; anything else is hashed with SHA-256.
 */
export function deriveKey(secret: string): Buffer {
    if (/^[0-9a-f]{64}$/i.test(secret)) {
        return Buffer.from(secret, 'hex');
    }
    console.warn('[Crypto] SESSION_ENCRYPTION_KEY is not 64 hex characters (256 bits). Using a SHA-256 hash of it.');
    return crypto.createHash('sha256').update(secret).digest();
}

/**
 * @returns iv_hex:authTag_hex:ciphertext_hex
 */
export function encrypt(plaintext: string, key: Buffer): string {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, key, iv);

    let encrypted = cipher.update(plaintext, 'utf8', 'hex');
    encrypted += cipher.final('hex');

    const authTag = cipher.getAuthTag().toString('hex');

    return `${iv.toString('hex')}:${authTag}:${encrypted}`;
}

export function isEncrypted(text: string): boolean {
    const parts = text.split(':');
    if (parts.length !== 3) return false;

    const [ivHex = '', authTagHex = ''] = parts;
    return ivHex.length === IV_LENGTH * 2 && authTagHex.length === TAG_LENGTH * 2;
}

export function decrypt(encryptedText: string, key: Buffer): string {
    if (!isEncrypted(encryptedText)) {
        throw new ClientError('Invalid encrypted session format (expected iv:authTag:ciphertext)');
    }

    const [ivHex = '', authTagHex = '', ciphertext = ''] = encryptedText.split(':');

    try {
        const decipher = crypto.createDecipheriv(ALGORITHM, key, Buffer.from(ivHex, 'hex'));
        decipher.setAuthTag(Buffer.from(authTagHex, 'hex'));

        let decrypted = decipher.update(ciphertext, 'hex', 'utf8');
        decrypted += decipher.final('utf8');

        return decrypted;
    } catch (err) {
        throw new ClientError(
            'Session decryption failed: SESSION_ENCRYPTION_KEY probably changed since the session was saved. ' +
            'Delete the session file and log in again.',
            { cause: err }
        );
    }
}

/**
 * Random key for initial setup
 * @returns 64 hex characters
 */
export function generateEncryptionKey(): string {
    return crypto.randomBytes(KEY_LENGTH).toString('hex');
}
