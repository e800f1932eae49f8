import { CouponValidationPolicy, CouponEvaluationContext } from './coupon-validation.policy';
import type { TokenCheckResult } from '../interfaces/validation.interface';
import { buildCoupon, daysFrom, TEST_NOW } from '../../testing/coupon.fixtures';

const VALID_TOKEN: TokenCheckResult = { wellFormed: true, signatureValid: true, stale: false };

function context(overrides: Partial<CouponEvaluationContext> = {}): CouponEvaluationContext {
    return {
        coupon: buildCoupon(),
        now: TEST_NOW,
        token: VALID_TOKEN,
        campaign: { id: 1, isActive: true },
        redemption: { stationId: 'station-1' },
        ...overrides,
    };
}

function kinds(ctx: CouponEvaluationContext): string[] {
    return CouponValidationPolicy.evaluate(ctx).map(violation => violation.kind);
}

describe('CouponValidationPolicy', () => {
    it('finds nothing wrong with a fresh, signed, active coupon', () => {
        expect(CouponValidationPolicy.evaluate(context())).toEqual([]);
    });

    it('reports station and fuel restrictions independently', () => {
        const coupon = buildCoupon({
            applicableStations: ['1', '2', '3'],
            applicableFuelTypes: ['Regular', 'Premium'],
        });

        expect(kinds(context({ coupon, redemption: { stationId: '2', fuelType: 'Premium' } }))).toEqual([]);
        expect(kinds(context({ coupon, redemption: { stationId: '4', fuelType: 'Premium' } })))
            .toEqual(['STATION_MISMATCH']);
        expect(kinds(context({ coupon, redemption: { stationId: '2', fuelType: 'Diesel' } })))
            .toEqual(['FUEL_TYPE_MISMATCH']);
        expect(kinds(context({ coupon, redemption: { stationId: '4', fuelType: 'Diesel' } })))
            .toEqual(['STATION_MISMATCH', 'FUEL_TYPE_MISMATCH']);
    });

    it('skips the fuel check when no fuel type is given', () => {
        const coupon = buildCoupon({ applicableFuelTypes: ['Regular'] });

        expect(kinds(context({ coupon, redemption: { stationId: 'station-1' } }))).toEqual([]);
    });

    it('reports an expired coupon with its end date', () => {
        const coupon = buildCoupon({
            validFrom: daysFrom(TEST_NOW, -30),
            validUntil: daysFrom(TEST_NOW, -1),
        });

        expect(CouponValidationPolicy.evaluate(context({ coupon }))).toEqual([
            {
                kind: 'EXPIRED',
                message: 'Coupon has expired',
                details: { validUntil: '2026-03-14T12:00:00.000Z' },
            },
        ]);
    });

    it('reports a coupon that is not yet valid', () => {
        const coupon = buildCoupon({ validFrom: daysFrom(TEST_NOW, 1), validUntil: daysFrom(TEST_NOW, 5) });

        expect(kinds(context({ coupon }))).toEqual(['NOT_YET_VALID']);
    });

    it('accepts a purchase exactly at the window edges', () => {
        const coupon = buildCoupon({ validFrom: TEST_NOW, validUntil: TEST_NOW });

        expect(kinds(context({ coupon }))).toEqual([]);
    });

    it('formats the minimum purchase in the violation message', () => {
        const coupon = buildCoupon({ minimumPurchaseCents: 2500 });

        expect(CouponValidationPolicy.evaluate(context({
            coupon,
            redemption: { stationId: 'station-1', purchaseAmountCents: 2000 },
        }))).toEqual([
            {
                kind: 'MINIMUM_PURCHASE_NOT_MET',
                message: 'Purchase amount does not meet minimum requirement of 25.00',
                details: { purchaseAmountCents: 2000, minimumPurchaseCents: 2500 },
            },
        ]);
        expect(kinds(context({ coupon, redemption: { stationId: 'station-1' } }))).toEqual([]);
    });

    it('treats a missing campaign as inactive', () => {
        expect(kinds(context({ campaign: null }))).toEqual(['CAMPAIGN_INACTIVE']);
        expect(kinds(context({ campaign: { id: 1, isActive: false } }))).toEqual(['CAMPAIGN_INACTIVE']);
    });

    it('lists every violation in rule order', () => {
        const coupon = buildCoupon({
            maxUses: 1,
            validFrom: daysFrom(TEST_NOW, -30),
            validUntil: daysFrom(TEST_NOW, -1),
            applicableStations: ['1'],
        });
        coupon.recordUse(daysFrom(TEST_NOW, -2));

        expect(kinds(context({
            coupon,
            token: { wellFormed: false, signatureValid: false, stale: true },
            campaign: null,
            redemption: { stationId: '9' },
        }))).toEqual([
            'MALFORMED_TOKEN',
            'SIGNATURE_INVALID',
            'TOKEN_STALE',
            'STATUS_NOT_ACTIVE',
            'EXPIRED',
            'USAGE_LIMIT_REACHED',
            'CAMPAIGN_INACTIVE',
            'STATION_MISMATCH',
        ]);
    });

    it('includes the status in the not-active message', () => {
        const coupon = buildCoupon();
        coupon.deactivate(TEST_NOW);

        const [violation] = CouponValidationPolicy.evaluate(context({ coupon }));

        expect(violation.message).toBe('Coupon is not active (status: INACTIVE)');
    });

    describe('evaluateConsumption', () => {
        it('only looks at status, window and usage', () => {
            const coupon = buildCoupon({ applicableStations: ['1'] });

            expect(CouponValidationPolicy.evaluateConsumption({ coupon, now: TEST_NOW })).toEqual([]);
        });

        it('flags an exhausted coupon', () => {
            const coupon = buildCoupon({ maxUses: 1 });
            coupon.recordUse(TEST_NOW);

            expect(CouponValidationPolicy.evaluateConsumption({ coupon, now: TEST_NOW }).map(v => v.kind))
                .toEqual(['STATUS_NOT_ACTIVE', 'USAGE_LIMIT_REACHED']);
        });
    });

    it('authenticates only well-formed, correctly signed tokens', () => {
        expect(CouponValidationPolicy.isAuthenticated(VALID_TOKEN)).toBe(true);
        expect(CouponValidationPolicy.isAuthenticated({ ...VALID_TOKEN, stale: true })).toBe(true);
        expect(CouponValidationPolicy.isAuthenticated({ ...VALID_TOKEN, signatureValid: false })).toBe(false);
    });

    it('cannot be used with violations or without remaining uses', () => {
        const coupon = buildCoupon();

        expect(CouponValidationPolicy.canBeUsed(coupon, [])).toBe(true);
        expect(CouponValidationPolicy.canBeUsed(coupon, [CouponValidationPolicy.notFound()])).toBe(false);
    });
});
