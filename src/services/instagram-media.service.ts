// ============================================================================
// Instagram Media — image download and upload limits
// ============================================================================
// The unofficial client uploads bytes, so the APOD image is downloaded first
// and checked against the feed photo limits. Nothing is resized here: an
// image outside the limits is rejected.
// ============================================================================

import { ApiError, ValidationError, redactUrl } from '../errors.js';
import { DEFAULT_TIMEOUT_MS, readBody, send } from './http.js';
import type { DownloadedImage, ImageLimits, MediaValidation } from '../types/instagram.types.js';

export const INSTAGRAM_IMAGE_LIMITS: ImageLimits = {
    maxSizeBytes: 8 * 1024 * 1024,     // 8 MB
    allowedFormats: ['image/jpeg', 'image/png'],
};

const MB = 1024 * 1024;

/**
 * Content type from the file signature, or undefined when unknown.
 */
export function detectImageType(buffer: Buffer): string | undefined {
    if (buffer.length >= 3 && buffer[0] === 0xff && buffer[1] === 0xd8 && buffer[2] === 0xff) {
        return 'image/jpeg';
    }
    if (buffer.length >= 8 && buffer.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))) {
        return 'image/png';
    }
    if (buffer.length >= 6 && ['GIF87a', 'GIF89a'].includes(buffer.subarray(0, 6).toString('latin1'))) {
        return 'image/gif';
    }
    if (buffer.length >= 12 && buffer.subarray(0, 4).toString('latin1') === 'RIFF' && buffer.subarray(8, 12).toString('latin1') === 'WEBP') {
        return 'image/webp';
    }
    return undefined;
}

function normalizeContentType(header: string | null): string {
    const type = (header ?? '').split(';')[0]?.trim().toLowerCase() ?? '';
    return type === 'image/jpg' ? 'image/jpeg' : type;
}

export function validateImage(
    contentType: string,
    sizeBytes: number,
    limits: ImageLimits = INSTAGRAM_IMAGE_LIMITS
): MediaValidation {
    const errors: string[] = [];

    if (!limits.allowedFormats.includes(contentType)) {
        errors.push(`Unsupported format ${contentType || 'unknown'}. Allowed: ${limits.allowedFormats.join(', ')}`);
    }
    if (sizeBytes === 0) {
        errors.push('Image is empty');
    }
    if (sizeBytes > limits.maxSizeBytes) {
        errors.push(`Image is ${(sizeBytes / MB).toFixed(1)} MB, limit is ${(limits.maxSizeBytes / MB).toFixed(0)} MB`);
    }

    return { valid: errors.length === 0, errors };
}

/**
 * Downloads an image and validates it. The file signature wins over the
 * Content-Type header, which some archive hosts get wrong.
 */
export async function downloadImage(
    url: string,
    options: { timeoutMs?: number; limits?: ImageLimits } = {}
): Promise<DownloadedImage> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const limits = options.limits ?? INSTAGRAM_IMAGE_LIMITS;
    const response = await send(url, { timeoutMs, headers: { Accept: 'image/*' } });

    if (!response.ok) {
        throw new ApiError(`HTTP ${response.status} downloading ${redactUrl(url)}`, {
            url,
            status: response.status,
        });
    }

    const declaredSize = Number(response.headers.get('content-length') ?? '');
    if (declaredSize > limits.maxSizeBytes) {
        await response.body?.cancel();
        throw new ValidationError(
            `Image rejected: Image is ${(declaredSize / MB).toFixed(1)} MB, limit is ${(limits.maxSizeBytes / MB).toFixed(0)} MB`
        );
    }

    const buffer = Buffer.from(await readBody(url, () => response.arrayBuffer(), timeoutMs));
    const contentType = detectImageType(buffer) ?? normalizeContentType(response.headers.get('content-type'));

    const validation = validateImage(contentType, buffer.length, limits);
    if (!validation.valid) {
        throw new ValidationError(`Image rejected: ${validation.errors.join('; ')}`);
    }

    console.log(`[Media] ✓ Downloaded ${(buffer.length / 1024).toFixed(0)} KB (${contentType})`);
    return { buffer, contentType, sizeBytes: buffer.length, sourceUrl: url };
}
