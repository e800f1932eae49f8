import { createHmac, KeyObject, sign, timingSafeEqual, verify } from 'node:crypto';
import { SigningKeyUnavailableError } from '../../domain/errors/coupon.errors';

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;

export interface TokenSignatureAlgorithm {
    readonly name: 'hmac-sha256' | 'rsa-sha256';
    sign(message: string): string;
    verify(message: string, signature: string): boolean;
}

/**
 * Decodes a base64url string only when it is the canonical encoding of its
 * bytes. Lenient decoding would accept variants differing in padding bits.
 */
export function decodeCanonicalBase64Url(value: string): Buffer | null {
    if (!BASE64URL_PATTERN.test(value)) return null;
    const bytes = Buffer.from(value, 'base64url');
    if (bytes.length === 0 || bytes.toString('base64url') !== value) return null;
    return bytes;
}

export class HmacSha256Algorithm implements TokenSignatureAlgorithm {
    readonly name = 'hmac-sha256';

    constructor(private readonly key: string | Buffer) { }

    sign(message: string): string {
        return createHmac('sha256', this.key).update(message, 'utf8').digest('base64url');
    }

    verify(message: string, signature: string): boolean {
        if (decodeCanonicalBase64Url(signature) === null) return false;

        const expected = Buffer.from(this.sign(message), 'utf8');
        const presented = Buffer.from(signature, 'utf8');
        if (expected.length !== presented.length) return false;
        return timingSafeEqual(expected, presented);
    }
}

export class RsaSha256Algorithm implements TokenSignatureAlgorithm {
    readonly name = 'rsa-sha256';

    constructor(
        private readonly publicKey: KeyObject,
        private readonly privateKey?: KeyObject,
    ) { }

    sign(message: string): string {
        if (!this.privateKey) {
            throw new SigningKeyUnavailableError('coupon token signing');
        }
        return sign('sha256', Buffer.from(message, 'utf8'), this.privateKey).toString('base64url');
    }

    verify(message: string, signature: string): boolean {
        const bytes = decodeCanonicalBase64Url(signature);
        if (bytes === null) return false;
        return verify('sha256', Buffer.from(message, 'utf8'), this.publicKey, bytes);
    }
}
