import { ConflictException, Inject, Injectable, NotFoundException } from '@nestjs/common';

import type { ICouponRepository } from '../domain/repositories/coupon.repository.interface';
import { COUPON_REPOSITORY } from '../domain/repositories/coupon.repository.interface';
import type { ICampaignRepository } from '../../campaigns/domain/repositories/campaign.repository.interface';
import { CAMPAIGN_REPOSITORY } from '../../campaigns/domain/repositories/campaign.repository.interface';
import { Coupon } from '../domain/aggregates/coupon.aggregate';
import { InvalidCouponTransitionError } from '../domain/errors/coupon.errors';
import { CouponValidationPolicy } from '../domain/policies/coupon-validation.policy';
import type { CouponConsumptionResult } from '../domain/interfaces/validation.interface';
import type { CouponStatusValue } from '../domain/value-objects/coupon-status.vo';
import { SigningKeyProvider } from '../infrastructure/crypto/signing-key.provider';

import { CLOCK } from '../../../shared/domain/clock';
import type { Clock } from '../../../shared/domain/clock';
import { DomainEventPublisher } from '../../../shared/infrastructure/domain-event-publisher';
import { CustomLoggerService } from '../../../common/services/logger.service';

export interface ConsumeUseOptions {
    stationId?: string;
    purchaseAmountCents?: number;
}

@Injectable()
export class CouponUsageApplicationService {
    constructor(
        @Inject(COUPON_REPOSITORY) private readonly couponRepository: ICouponRepository,
        @Inject(CAMPAIGN_REPOSITORY) private readonly campaignRepository: ICampaignRepository,
        @Inject(CLOCK) private readonly clock: Clock,
        private readonly keys: SigningKeyProvider,
        private readonly eventPublisher: DomainEventPublisher,
        private readonly logger: CustomLoggerService,
    ) { }

    /**
     * Consumes exactly one use of a coupon.
     *
     * The coupon is re-read and re-checked (status, date window, usage) on
     * every attempt, and the write is a compare-and-set on the use count and
     * status that were read. A lost race re-reads and re-checks, so the
     * loser of a race for the last use ends with a usage-limit violation.
     */
    async consumeUse(couponId: string, options: ConsumeUseOptions = {}): Promise<CouponConsumptionResult> {
        const maxAttempts = this.keys.consumeMaxAttempts;
        let latest: Coupon | null = null;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            const coupon = await this.couponRepository.findById(couponId);
            if (!coupon) {
                return { consumed: false, coupon: null, violations: [CouponValidationPolicy.notFound()] };
            }
            latest = coupon;

            const now = this.clock.now();
            const violations = CouponValidationPolicy.evaluateConsumption({ coupon, now });
            if (violations.length > 0) {
                return { consumed: false, coupon, violations };
            }

            const expected = { currentUses: coupon.usage.currentUses, status: coupon.status.value };
            coupon.recordUse(now, options.stationId);

            const applied = await this.couponRepository.compareAndSetUsage(coupon, expected);
            if (!applied) {
                this.logger.debug('Coupon usage write lost a race, retrying', {
                    couponId,
                    attempt,
                });
                continue;
            }

            await this.recordCampaignUse(coupon);
            this.eventPublisher.publishEventsFromAggregate(coupon);

            this.logger.logBusinessEvent('coupon_consumed', {
                couponId: coupon.id,
                campaignId: coupon.campaignId,
                stationId: options.stationId,
                currentUses: coupon.usage.currentUses,
                status: coupon.status.value,
            });

            return {
                consumed: true,
                coupon,
                discountAppliedCents: options.purchaseAmountCents === undefined
                    ? null
                    : coupon.discount.calculateDiscountCents(options.purchaseAmountCents),
                raffleTicketsGranted: coupon.raffleTickets,
            };
        }

        this.logger.warn('Coupon usage gave up after concurrent modifications', { couponId, attempts: maxAttempts });
        return {
            consumed: false,
            coupon: latest,
            violations: [CouponValidationPolicy.concurrentModification(maxAttempts)],
        };
    }

    async activate(couponId: string): Promise<Coupon> {
        return this.changeStatus(couponId, 'ACTIVE', (coupon, now) => coupon.activate(now));
    }

    async deactivate(couponId: string): Promise<Coupon> {
        return this.changeStatus(couponId, 'INACTIVE', (coupon, now) => coupon.deactivate(now));
    }

    async cancel(couponId: string, reason?: string): Promise<Coupon> {
        return this.changeStatus(couponId, 'CANCELLED', (coupon, now) => coupon.cancel(now, reason));
    }

    /**
     * Marks every non-terminal coupon past its validity window as EXPIRED.
     * Called by the external scheduler.
     */
    async expireOverdue(): Promise<number> {
        const now = this.clock.now();
        const expiredIds = await this.couponRepository.expireOverdue(now);

        if (expiredIds.length > 0) {
            this.logger.logBusinessEvent('coupons_expired', {
                count: expiredIds.length,
                couponIds: expiredIds,
                at: now.toISOString(),
            });
        }

        return expiredIds.length;
    }

    private async changeStatus(
        couponId: string,
        target: CouponStatusValue,
        apply: (coupon: Coupon, now: Date) => void,
    ): Promise<Coupon> {
        const coupon = await this.couponRepository.findById(couponId);
        if (!coupon) {
            throw new NotFoundException(`Coupon ${couponId} not found`);
        }
        if (coupon.status.value === target) {
            return coupon;
        }

        const expected = coupon.status.value;
        const now = this.clock.now();
        try {
            apply(coupon, now);
        } catch (error) {
            if (error instanceof InvalidCouponTransitionError) {
                throw new ConflictException(error.message);
            }
            throw error;
        }

        const applied = await this.couponRepository.compareAndSetStatus(couponId, expected, target, now);
        if (!applied) {
            throw new ConflictException(`Coupon ${couponId} was modified concurrently`);
        }

        this.eventPublisher.publishEventsFromAggregate(coupon);
        return coupon;
    }

    private async recordCampaignUse(coupon: Coupon): Promise<void> {
        // The use is already committed; a failed stats update must not report it as failed.
        try {
            await this.campaignRepository.incrementUsedCoupons(coupon.campaignId);
        } catch (error) {
            this.logger.logError(error instanceof Error ? error : new Error(String(error)), {
                couponId: coupon.id,
                campaignId: coupon.campaignId,
                operation: 'increment_used_coupons',
            });
        }
    }
}
