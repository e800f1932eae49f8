import type { CouponRecord } from '../interfaces/coupon-record.interface';
import type { IntegrityIssue } from '../interfaces/integrity.interface';

export interface TokenIntegrity {
    wellFormed: boolean;
    signatureValid: boolean;
}

/**
 * Domain Policy: Coupon Integrity
 * Structural checks over a raw stored record. Reports, never repairs.
 */
export class CouponIntegrityPolicy {
    static inspect(record: CouponRecord, token: TokenIntegrity): IntegrityIssue[] {
        const issues: IntegrityIssue[] = [];

        if (!token.wellFormed) {
            issues.push({ code: 'INVALID_TOKEN_FORMAT', message: 'Invalid token format' });
        }
        if (!token.signatureValid) {
            issues.push({ code: 'INVALID_SIGNATURE', message: 'Invalid token signature' });
        }
        if (record.validFrom.getTime() > record.validUntil.getTime()) {
            issues.push({ code: 'INVALID_DATE_RANGE', message: 'Invalid date range' });
        }
        if (record.maxUses !== null && record.currentUses > record.maxUses) {
            issues.push({ code: 'USAGE_OVERRUN', message: 'Current uses exceed maximum uses' });
        }
        if (record.fixedDiscountCents !== null && record.discountPercentage !== null) {
            issues.push({
                code: 'CONFLICTING_DISCOUNT_TYPES',
                message: 'Both fixed amount and percentage discount are set',
            });
        }
        if (record.status === 'USED_UP' && (record.maxUses === null || record.currentUses !== record.maxUses)) {
            issues.push({
                code: 'STATUS_USAGE_MISMATCH',
                message: 'Status is USED_UP but usage count does not match the limit',
            });
        }

        return issues;
    }
}
