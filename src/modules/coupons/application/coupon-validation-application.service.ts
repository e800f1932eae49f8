import { Inject, Injectable } from '@nestjs/common';

import type { ICouponRepository } from '../domain/repositories/coupon.repository.interface';
import { COUPON_REPOSITORY } from '../domain/repositories/coupon.repository.interface';
import type { ICampaignRepository } from '../../campaigns/domain/repositories/campaign.repository.interface';
import { CAMPAIGN_REPOSITORY } from '../../campaigns/domain/repositories/campaign.repository.interface';
import { Coupon } from '../domain/aggregates/coupon.aggregate';
import { CouponValidationPolicy } from '../domain/policies/coupon-validation.policy';
import type {
    CouponEvaluatedOutcome,
    CouponUsageStats,
    CouponValidationOutcome,
    PreValidationResult,
    RedemptionContext,
    TokenCheckResult,
} from '../domain/interfaces/validation.interface';
import { CouponTokenVerifier } from '../infrastructure/crypto/coupon-token.verifier';
import { SigningKeyProvider } from '../infrastructure/crypto/signing-key.provider';
import { RedemptionContextDto } from './dto/redemption-context.dto';

import { CLOCK } from '../../../shared/domain/clock';
import type { Clock } from '../../../shared/domain/clock';
import { CommandValidator } from '../../../common/validation/command.validator';
import { CustomLoggerService } from '../../../common/services/logger.service';

/**
 * Read-only redemption checks. Nothing here writes; every call can be
 * repeated freely.
 */
@Injectable()
export class CouponValidationApplicationService {
    constructor(
        @Inject(COUPON_REPOSITORY) private readonly couponRepository: ICouponRepository,
        @Inject(CAMPAIGN_REPOSITORY) private readonly campaignRepository: ICampaignRepository,
        @Inject(CLOCK) private readonly clock: Clock,
        private readonly verifier: CouponTokenVerifier,
        private readonly keys: SigningKeyProvider,
        private readonly commandValidator: CommandValidator,
        private readonly logger: CustomLoggerService,
    ) { }

    async validateForRedemption(token: string, context: RedemptionContext): Promise<CouponValidationOutcome> {
        const redemption = await this.commandValidator.validate(RedemptionContextDto, context);
        const coupon = await this.couponRepository.findByToken(token);
        if (!coupon) {
            return this.notFound();
        }
        return this.evaluate(coupon, redemption);
    }

    async validateByCouponCode(couponCode: string, context: RedemptionContext): Promise<CouponValidationOutcome> {
        const redemption = await this.commandValidator.validate(RedemptionContextDto, context);
        const coupon = await this.couponRepository.findByCouponCode(couponCode);
        if (!coupon) {
            return this.notFound();
        }
        return this.evaluate(coupon, redemption);
    }

    /**
     * One outcome per token, in input order. Tokens are evaluated
     * independently; a repeated token is looked up again.
     */
    async validateBatch(tokens: readonly string[], context: RedemptionContext): Promise<CouponValidationOutcome[]> {
        const redemption = await this.commandValidator.validate(RedemptionContextDto, context);
        const outcomes: CouponValidationOutcome[] = [];
        for (const token of tokens) {
            const coupon = await this.couponRepository.findByToken(token);
            outcomes.push(coupon ? await this.evaluate(coupon, redemption) : this.notFound());
        }
        return outcomes;
    }

    async preValidate(token: string): Promise<PreValidationResult> {
        const coupon = await this.couponRepository.findByToken(token);
        if (!coupon) {
            return {
                exists: false,
                isActive: false,
                isExpired: false,
                campaignId: null,
                campaignName: null,
                discountInfo: null,
            };
        }

        const now = this.clock.now();
        const campaign = await this.campaignRepository.findById(coupon.campaignId);
        const isExpired = coupon.validity.hasExpired(now);

        return {
            exists: true,
            // Past validUntil but not yet swept still previews as inactive.
            isActive: coupon.status.isActive && !isExpired,
            isExpired,
            campaignId: coupon.campaignId,
            campaignName: campaign?.name ?? null,
            discountInfo: coupon.discount.describe(coupon.raffleTickets),
        };
    }

    async getUsageStats(couponId: string): Promise<CouponUsageStats | null> {
        const coupon = await this.couponRepository.findById(couponId);
        if (!coupon) return null;

        const { usage } = coupon;
        return {
            couponId: coupon.id,
            couponCode: coupon.couponCode.value,
            currentUses: usage.currentUses,
            maxUses: usage.maxUses,
            remainingUses: usage.remaining,
            usageRate: usage.maxUses === null ? null : (usage.currentUses / usage.maxUses) * 100,
            isMaxUsesReached: usage.isExhausted,
        };
    }

    /**
     * Format, signature and age of the stored token. The signature is
     * recomputed from the record's issuance fields.
     */
    checkToken(coupon: Coupon): TokenCheckResult {
        const algorithm = this.keys.couponAlgorithm(coupon.campaignId);
        return {
            wellFormed: this.verifier.isWellFormed(coupon.token),
            signatureValid: this.verifier.verifySignature(
                coupon.token,
                coupon.tokenSignature,
                coupon.signedFields,
                algorithm,
            ),
            stale: this.verifier.isStaleByTimestamp(coupon.token, this.keys.tokenMaxAgeMs, this.clock.now()),
        };
    }

    private async evaluate(coupon: Coupon, redemption: RedemptionContext): Promise<CouponEvaluatedOutcome> {
        const now = this.clock.now();
        const token = this.checkToken(coupon);
        this.reportTokenProblems(coupon, token, redemption.stationId);

        const campaign = await this.campaignRepository.findById(coupon.campaignId);
        const violations = CouponValidationPolicy.evaluate({
            coupon,
            now,
            token,
            campaign: campaign ? { id: campaign.id, isActive: campaign.isActive } : null,
            redemption,
        });

        return {
            outcome: 'EVALUATED',
            isValid: violations.length === 0,
            canBeUsed: CouponValidationPolicy.canBeUsed(coupon, violations),
            authenticated: CouponValidationPolicy.isAuthenticated(token),
            coupon,
            violations,
        };
    }

    private reportTokenProblems(coupon: Coupon, token: TokenCheckResult, stationId: string): void {
        const context = { couponId: coupon.id, campaignId: coupon.campaignId, stationId };
        if (!token.wellFormed) {
            this.logger.logSecurityEvent('coupon_token_malformed', context);
        }
        if (!token.signatureValid) {
            this.logger.logSecurityEvent('coupon_signature_mismatch', context);
        }
        if (token.stale) {
            this.logger.logSecurityEvent('coupon_token_stale', context);
        }
    }

    private notFound(): CouponValidationOutcome {
        return {
            outcome: 'NOT_FOUND',
            isValid: false,
            canBeUsed: false,
            authenticated: false,
            coupon: null,
            violations: [CouponValidationPolicy.notFound()],
        };
    }
}
