import { Injectable } from '@nestjs/common';
import { randomInt } from 'node:crypto';
import { CouponToken } from '../../domain/value-objects/coupon-token.vo';
import type { SignedCouponFields } from '../../domain/interfaces/coupon-record.interface';
import type { TokenSignatureAlgorithm } from './token-signature.algorithm';

const NONCE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const NONCE_LENGTH = 8;
const RANDOM_SEQUENCE_BOUND = 1_000_000;

export interface CouponTokenInput {
    campaignId: number;
    couponCode: string;
    issuedAt: Date;
    /** Random when omitted. */
    sequence?: number;
}

export interface SignedCouponToken {
    token: string;
    signature: string;
    /** issuedAt truncated to the second, the precision the token carries. */
    issuedAt: Date;
}

/**
 * The exact bytes covered by a coupon signature: the token plus the
 * record's issuance fields, so a signature never depends on mutable state.
 */
export function couponSigningMessage(token: string, fields: SignedCouponFields): string {
    return [token, String(fields.campaignId), fields.couponCode, fields.issuedAt.toISOString()].join('|');
}

export function generateNonce(): string {
    let nonce = '';
    for (let i = 0; i < NONCE_LENGTH; i++) {
        nonce += NONCE_ALPHABET[randomInt(NONCE_ALPHABET.length)];
    }
    return nonce;
}

@Injectable()
export class CouponTokenSigner {
    signCouponToken(input: CouponTokenInput, algorithm: TokenSignatureAlgorithm): SignedCouponToken {
        const issuedAt = new Date(Math.floor(input.issuedAt.getTime() / 1000) * 1000);

        const token = CouponToken.compose({
            campaignId: input.campaignId,
            sequence: input.sequence ?? randomInt(RANDOM_SEQUENCE_BOUND),
            issuedAt,
            nonce: generateNonce(),
            couponCode: input.couponCode,
        });

        const signature = algorithm.sign(couponSigningMessage(token.value, {
            campaignId: input.campaignId,
            couponCode: input.couponCode,
            issuedAt,
        }));

        return { token: token.value, signature, issuedAt };
    }
}
