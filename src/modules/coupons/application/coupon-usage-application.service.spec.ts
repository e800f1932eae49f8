import { ConflictException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';
import { CouponUsageApplicationService } from './coupon-usage-application.service';
import { COUPON_REPOSITORY } from '../domain/repositories/coupon.repository.interface';
import { SigningKeyProvider } from '../infrastructure/crypto/signing-key.provider';
import { InMemoryCouponRepository } from '../testing/in-memory-coupon.repository';
import {
    buildCampaign,
    buildCouponRecord,
    daysFrom,
    mockLogger,
    MockLogger,
    TEST_NOW,
    testSecurityConfig,
} from '../testing/coupon.fixtures';
import { CAMPAIGN_REPOSITORY } from '../../campaigns/domain/repositories/campaign.repository.interface';
import { InMemoryCampaignRepository } from '../../campaigns/testing/in-memory-campaign.repository';
import { CLOCK, FixedClock } from '../../../shared/domain/clock';
import { DomainEventPublisher } from '../../../shared/infrastructure/domain-event-publisher';
import { CustomLoggerService } from '../../../common/services/logger.service';

describe('CouponUsageApplicationService', () => {
    let service: CouponUsageApplicationService;
    let coupons: InMemoryCouponRepository;
    let campaigns: InMemoryCampaignRepository;
    let eventEmitter: EventEmitter2;
    let logger: MockLogger;

    function emittedEvents(): unknown[] {
        return jest.mocked(eventEmitter.emit).mock.calls.map(([name]) => name);
    }

    beforeEach(async () => {
        coupons = new InMemoryCouponRepository();
        campaigns = new InMemoryCampaignRepository();
        campaigns.save(buildCampaign());
        eventEmitter = new EventEmitter2();
        jest.spyOn(eventEmitter, 'emit');
        logger = mockLogger();

        const module: TestingModule = await Test.createTestingModule({
            providers: [
                CouponUsageApplicationService,
                SigningKeyProvider,
                DomainEventPublisher,
                { provide: COUPON_REPOSITORY, useValue: coupons },
                { provide: CAMPAIGN_REPOSITORY, useValue: campaigns },
                { provide: CLOCK, useValue: new FixedClock(TEST_NOW) },
                { provide: EventEmitter2, useValue: eventEmitter },
                { provide: ConfigService, useValue: new ConfigService({ couponSecurity: testSecurityConfig() }) },
                { provide: CustomLoggerService, useValue: logger },
            ],
        }).compile();

        service = module.get<CouponUsageApplicationService>(CouponUsageApplicationService);
    });

    describe('consumeUse', () => {
        it('should consume one use and report the discount applied', async () => {
            coupons.seed(buildCouponRecord({ maxUses: 3 }));

            const result = await service.consumeUse('coupon-1', { stationId: 'station-1', purchaseAmountCents: 5000 });

            expect(result.consumed).toBe(true);
            if (!result.consumed) return;
            expect(result.discountAppliedCents).toBe(1000);
            expect(result.raffleTicketsGranted).toBe(1);
            expect(coupons.snapshot('coupon-1')?.currentUses).toBe(1);
            expect(coupons.snapshot('coupon-1')?.status).toBe('ACTIVE');
            expect(campaigns.snapshot(1)?.used_coupons).toBe(1);
            expect(emittedEvents()).toEqual(['coupon.used']);
            expect(logger.logBusinessEvent).toHaveBeenCalledWith('coupon_consumed', {
                couponId: 'coupon-1',
                campaignId: 1,
                stationId: 'station-1',
                currentUses: 1,
                status: 'ACTIVE',
            });
        });

        it('should leave the discount empty without a purchase amount', async () => {
            coupons.seed(buildCouponRecord());

            const result = await service.consumeUse('coupon-1');

            expect(result).toEqual(expect.objectContaining({ consumed: true, discountAppliedCents: null }));
        });

        it('should move to USED_UP on the last use and refuse the next one', async () => {
            coupons.seed(buildCouponRecord({ maxUses: 1 }));

            const first = await service.consumeUse('coupon-1');
            const second = await service.consumeUse('coupon-1');

            expect(first.consumed).toBe(true);
            expect(coupons.snapshot('coupon-1')?.status).toBe('USED_UP');
            expect(emittedEvents()).toEqual(['coupon.used', 'coupon.status_changed', 'coupon.used_up']);
            expect(second.consumed).toBe(false);
            if (second.consumed) return;
            expect(second.violations.map(violation => violation.kind)).toEqual(['STATUS_NOT_ACTIVE', 'USAGE_LIMIT_REACHED']);
            expect(coupons.snapshot('coupon-1')?.currentUses).toBe(1);
        });

        it('should refuse a stored coupon whose uses already exceed the limit', async () => {
            const record = buildCouponRecord({ currentUses: 10, maxUses: 5 });
            coupons.seed(record);

            const result = await service.consumeUse('coupon-1');

            expect(result.consumed).toBe(false);
            if (result.consumed) return;
            expect(result.violations).toEqual([{
                kind: 'USAGE_LIMIT_REACHED',
                message: 'Coupon has reached maximum usage limit',
                details: { currentUses: 10, maxUses: 5 },
            }]);
            expect(coupons.snapshot('coupon-1')).toEqual(record);
        });

        it('should refuse a stored coupon with an inverted validity window', async () => {
            coupons.seed(buildCouponRecord({ validFrom: daysFrom(TEST_NOW, 5), validUntil: daysFrom(TEST_NOW, -5) }));

            const result = await service.consumeUse('coupon-1');

            expect(result.consumed).toBe(false);
            if (result.consumed) return;
            expect(result.violations.map(violation => violation.kind)).toEqual(['NOT_YET_VALID']);
            expect(coupons.snapshot('coupon-1')?.currentUses).toBe(0);
        });

        it('should refuse a stored coupon carrying both discount kinds', async () => {
            coupons.seed(buildCouponRecord({ discountPercentage: 10 }));

            const result = await service.consumeUse('coupon-1', { purchaseAmountCents: 5000 });

            expect(result.consumed).toBe(false);
            if (result.consumed) return;
            expect(result.violations.map(violation => violation.kind)).toEqual(['DISCOUNT_TERMS_CONFLICT']);
            expect(coupons.snapshot('coupon-1')?.currentUses).toBe(0);
            expect(emittedEvents()).toEqual([]);
        });

        it('should let exactly one of two concurrent consumers take the last use', async () => {
            coupons.seed(buildCouponRecord({ maxUses: 1 }));

            const results = await Promise.all([
                service.consumeUse('coupon-1', { stationId: 'station-1' }),
                service.consumeUse('coupon-1', { stationId: 'station-2' }),
            ]);

            expect(results.filter(result => result.consumed)).toHaveLength(1);
            const loser = results.find(result => !result.consumed);
            expect(loser && !loser.consumed ? loser.violations.map(violation => violation.kind) : [])
                .toEqual(['STATUS_NOT_ACTIVE', 'USAGE_LIMIT_REACHED']);
            expect(coupons.snapshot('coupon-1')?.currentUses).toBe(1);
            expect(campaigns.snapshot(1)?.used_coupons).toBe(1);
            expect(logger.debug).toHaveBeenCalledWith('Coupon usage write lost a race, retrying', {
                couponId: 'coupon-1',
                attempt: 1,
            });
        });

        it('should give up after the configured number of lost races', async () => {
            coupons.seed(buildCouponRecord());
            const findById = jest.spyOn(coupons, 'findById');
            jest.spyOn(coupons, 'compareAndSetUsage').mockResolvedValue(false);

            const result = await service.consumeUse('coupon-1');

            expect(result.consumed).toBe(false);
            if (result.consumed) return;
            expect(result.violations).toEqual([{
                kind: 'CONCURRENT_MODIFICATION',
                message: 'Coupon was modified concurrently, please re-validate',
                details: { attempts: 3 },
            }]);
            expect(findById).toHaveBeenCalledTimes(3);
            expect(coupons.snapshot('coupon-1')?.currentUses).toBe(0);
        });

        it('should refuse an expired coupon without writing', async () => {
            coupons.seed(buildCouponRecord({
                validFrom: daysFrom(TEST_NOW, -10),
                validUntil: daysFrom(TEST_NOW, -1),
            }));

            const result = await service.consumeUse('coupon-1');

            expect(result.consumed).toBe(false);
            if (result.consumed) return;
            expect(result.violations.map(violation => violation.kind)).toEqual(['EXPIRED']);
            expect(coupons.snapshot('coupon-1')?.currentUses).toBe(0);
            expect(emittedEvents()).toEqual([]);
        });

        it('should report an unknown coupon', async () => {
            const result = await service.consumeUse('missing');

            expect(result).toEqual({
                consumed: false,
                coupon: null,
                violations: [{ kind: 'NOT_FOUND', message: 'Coupon not found' }],
            });
        });

        it('should keep a committed use when the campaign counter fails', async () => {
            coupons.seed(buildCouponRecord());
            jest.spyOn(campaigns, 'incrementUsedCoupons').mockRejectedValue(new Error('connection reset'));

            const result = await service.consumeUse('coupon-1');

            expect(result.consumed).toBe(true);
            expect(coupons.snapshot('coupon-1')?.currentUses).toBe(1);
            expect(logger.logError).toHaveBeenCalledWith(expect.any(Error), {
                couponId: 'coupon-1',
                campaignId: 1,
                operation: 'increment_used_coupons',
            });
        });
    });

    describe('status changes', () => {
        it('should block use while inactive and keep the count on reactivation', async () => {
            coupons.seed(buildCouponRecord({ maxUses: 5, currentUses: 2 }));

            await service.deactivate('coupon-1');
            const blocked = await service.consumeUse('coupon-1');
            await service.activate('coupon-1');
            const allowed = await service.consumeUse('coupon-1');

            expect(blocked.consumed).toBe(false);
            expect(allowed.consumed).toBe(true);
            expect(coupons.snapshot('coupon-1')?.currentUses).toBe(3);
            expect(coupons.snapshot('coupon-1')?.status).toBe('ACTIVE');
        });

        it('should treat a change to the current status as a no-op', async () => {
            coupons.seed(buildCouponRecord());

            await service.deactivate('coupon-1');
            const again = await service.deactivate('coupon-1');

            expect(again.status.value).toBe('INACTIVE');
            expect(emittedEvents()).toEqual(['coupon.status_changed']);
        });

        it('should refuse to reactivate a cancelled coupon', async () => {
            coupons.seed(buildCouponRecord());
            await service.cancel('coupon-1', 'reported stolen');

            await expect(service.activate('coupon-1')).rejects.toThrow(ConflictException);
            await expect(service.activate('coupon-1')).rejects.toThrow('Coupon cannot transition from CANCELLED to ACTIVE');
            expect(coupons.snapshot('coupon-1')?.status).toBe('CANCELLED');
        });

        it('should surface a concurrent status write as a conflict', async () => {
            coupons.seed(buildCouponRecord());
            jest.spyOn(coupons, 'compareAndSetStatus').mockResolvedValue(false);

            await expect(service.cancel('coupon-1')).rejects.toThrow('Coupon coupon-1 was modified concurrently');
        });

        it('should throw for an unknown coupon', async () => {
            await expect(service.deactivate('missing')).rejects.toThrow(NotFoundException);
        });
    });

    describe('expireOverdue', () => {
        it('should expire only open coupons past their window', async () => {
            const past = { validFrom: daysFrom(TEST_NOW, -10), validUntil: daysFrom(TEST_NOW, -1) };
            coupons.seed(
                buildCouponRecord({ id: 'active-past', couponCode: 'ACTIVE-PAST', ...past }),
                buildCouponRecord({ id: 'inactive-past', couponCode: 'INACTIVE-PAST', status: 'INACTIVE', ...past }),
                buildCouponRecord({ id: 'used-up-past', couponCode: 'USED-UP-PAST', status: 'USED_UP', maxUses: 1, currentUses: 1, ...past }),
                buildCouponRecord({ id: 'active-current', couponCode: 'ACTIVE-CURRENT' }),
            );

            await expect(service.expireOverdue()).resolves.toBe(2);
            expect(coupons.snapshot('active-past')?.status).toBe('EXPIRED');
            expect(coupons.snapshot('inactive-past')?.status).toBe('EXPIRED');
            expect(coupons.snapshot('used-up-past')?.status).toBe('USED_UP');
            expect(coupons.snapshot('active-current')?.status).toBe('ACTIVE');
            expect(logger.logBusinessEvent).toHaveBeenCalledWith('coupons_expired', {
                count: 2,
                couponIds: ['active-past', 'inactive-past'],
                at: '2026-03-15T12:00:00.000Z',
            });
        });

        it('should stay quiet when nothing is overdue', async () => {
            coupons.seed(buildCouponRecord());

            await expect(service.expireOverdue()).resolves.toBe(0);
            expect(logger.logBusinessEvent).not.toHaveBeenCalled();
        });
    });
});
