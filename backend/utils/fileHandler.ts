import crypto from 'crypto';
import { config, MIME_TYPES } from '../config/app';
import type { DeclaredType } from '../models/ParsedDocument';

export function validateFileSize(size: number): boolean {
    return size <= config.upload.maxFileSize;
}

/**
 * Maps an upload MIME type to the extractor type hint, or null when unsupported.
 */
export function declaredTypeFromMimeType(mimeType: string): DeclaredType | null {
    if (!config.upload.allowedMimeTypes.includes(mimeType)) {
        return null;
    }
    if (mimeType === MIME_TYPES.pdf) {
        return 'pdf';
    }
    if (mimeType === MIME_TYPES.docx) {
        return 'docx';
    }
    return null;
}

/**
 * SHA-256 of the uploaded bytes as 64 hex characters. Callers use it to
 * detect re-uploads of the same document.
 */
export function calculateFileHash(buffer: Buffer): string {
    return crypto.createHash('sha256').update(buffer).digest('hex');
}
