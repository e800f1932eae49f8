import { Injectable } from '@nestjs/common';
import { CouponToken } from '../../domain/value-objects/coupon-token.vo';
import type { SignedCouponFields } from '../../domain/interfaces/coupon-record.interface';
import type { TokenSignatureAlgorithm } from './token-signature.algorithm';
import { couponSigningMessage } from './coupon-token.signer';

@Injectable()
export class CouponTokenVerifier {
    isWellFormed(token: string): boolean {
        return CouponToken.isWellFormed(token);
    }

    /**
     * Recomputes the signature from the stored record's fields, never from
     * claims inside the presented token. Empty signatures are rejected.
     */
    verifySignature(
        token: string,
        signature: string,
        fields: SignedCouponFields,
        algorithm: TokenSignatureAlgorithm,
    ): boolean {
        if (signature.length === 0) return false;
        return algorithm.verify(couponSigningMessage(token, fields), signature);
    }

    /**
     * Age check on the timestamp embedded in the token. A token whose
     * timestamp cannot be read counts as stale.
     */
    isStaleByTimestamp(token: string, maxAgeMs: number, now: Date): boolean {
        const parsed = CouponToken.tryParse(token);
        if (!parsed) return true;
        return now.getTime() - parsed.issuedAt.getTime() > maxAgeMs;
    }
}
