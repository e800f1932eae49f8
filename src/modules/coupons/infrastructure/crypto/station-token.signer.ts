import { Inject, Injectable } from '@nestjs/common';
import { KeyObject, randomUUID, sign, verify } from 'node:crypto';
import { CLOCK } from '../../../../shared/domain/clock';
import type { Clock } from '../../../../shared/domain/clock';
import { decodeCanonicalBase64Url } from './token-signature.algorithm';

export interface StationTokenPayload {
    stationId: string;
    dispenserId: string;
    nonce: string;
    issuedAt: Date;
    expiresAt: Date;
}

export type StationTokenVerification =
    | { valid: true; payload: StationTokenPayload }
    | { valid: false; reason: 'MALFORMED' | 'SIGNATURE_INVALID' }
    | { valid: false; reason: 'EXPIRED'; payload: StationTokenPayload };

// Wire shape, epoch seconds
interface StationTokenClaims {
    s: string;
    d: string;
    n: string;
    t: number;
    exp: number;
}

function isStationTokenClaims(value: unknown): value is StationTokenClaims {
    if (typeof value !== 'object' || value === null) return false;
    const claims: Record<string, unknown> = { ...value };
    return typeof claims.s === 'string' && claims.s.length > 0
        && typeof claims.d === 'string' && claims.d.length > 0
        && typeof claims.n === 'string'
        && Number.isInteger(claims.t)
        && Number.isInteger(claims.exp);
}

function toPayload(claims: StationTokenClaims): StationTokenPayload {
    return {
        stationId: claims.s,
        dispenserId: claims.d,
        nonce: claims.n,
        issuedAt: new Date(claims.t * 1000),
        expiresAt: new Date(claims.exp * 1000),
    };
}

/**
 * Dispenser access tokens: `<base64url claims>.<base64url RSA-SHA256 signature>`.
 * Stateless; nothing is stored for them.
 */
@Injectable()
export class StationTokenSigner {
    constructor(@Inject(CLOCK) private readonly clock: Clock) { }

    sign(stationId: string, dispenserId: string, expiresAt: Date, privateKey: KeyObject): string {
        const claims: StationTokenClaims = {
            s: stationId,
            d: dispenserId,
            n: randomUUID(),
            t: Math.floor(this.clock.now().getTime() / 1000),
            exp: Math.floor(expiresAt.getTime() / 1000),
        };

        const body = Buffer.from(JSON.stringify(claims), 'utf8').toString('base64url');
        const signature = sign('sha256', Buffer.from(body, 'utf8'), privateKey).toString('base64url');
        return `${body}.${signature}`;
    }

    verify(token: string, publicKey: KeyObject): StationTokenVerification {
        const segments = token.split('.');
        if (segments.length !== 2) {
            return { valid: false, reason: 'MALFORMED' };
        }

        const [body, signature] = segments;
        const bodyBytes = decodeCanonicalBase64Url(body);
        if (bodyBytes === null) {
            return { valid: false, reason: 'MALFORMED' };
        }

        const signatureBytes = decodeCanonicalBase64Url(signature);
        if (signatureBytes === null || !verify('sha256', Buffer.from(body, 'utf8'), publicKey, signatureBytes)) {
            return { valid: false, reason: 'SIGNATURE_INVALID' };
        }

        let decoded: unknown;
        try {
            decoded = JSON.parse(bodyBytes.toString('utf8'));
        } catch {
            return { valid: false, reason: 'MALFORMED' };
        }
        if (!isStationTokenClaims(decoded)) {
            return { valid: false, reason: 'MALFORMED' };
        }

        const payload = toPayload(decoded);
        if (this.clock.now().getTime() >= payload.expiresAt.getTime()) {
            return { valid: false, reason: 'EXPIRED', payload };
        }

        return { valid: true, payload };
    }
}
