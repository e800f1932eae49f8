import {
    BadRequestException,
    ConflictException,
    Inject,
    Injectable,
    NotFoundException,
} from '@nestjs/common';
import { randomUUID } from 'node:crypto';

import type { ICouponRepository } from '../domain/repositories/coupon.repository.interface';
import { COUPON_REPOSITORY } from '../domain/repositories/coupon.repository.interface';
import type { ICampaignRepository } from '../../campaigns/domain/repositories/campaign.repository.interface';
import { CAMPAIGN_REPOSITORY } from '../../campaigns/domain/repositories/campaign.repository.interface';
import { Coupon } from '../domain/aggregates/coupon.aggregate';
import { CouponCode } from '../domain/value-objects/coupon-code.vo';
import { Discount } from '../domain/value-objects/discount.vo';
import { CouponTokenSigner } from '../infrastructure/crypto/coupon-token.signer';
import { SigningKeyProvider } from '../infrastructure/crypto/signing-key.provider';
import { DiscountTermsDto, IssueCouponsDto } from './dto/issue-coupons.dto';

import { CLOCK } from '../../../shared/domain/clock';
import type { Clock } from '../../../shared/domain/clock';
import { DomainEventPublisher } from '../../../shared/infrastructure/domain-event-publisher';
import { CommandValidator } from '../../../common/validation/command.validator';
import { CustomLoggerService } from '../../../common/services/logger.service';

export interface DiscountTermsInput {
    type: 'fixed' | 'percentage' | 'none';
    amountCents?: number;
    percentage?: number;
}

export interface IssueCouponsCommand {
    campaignId: number;
    count: number;
    validFrom?: Date;
    validUntil?: Date;
    discount?: DiscountTermsInput;
    minimumPurchaseCents?: number;
    applicableFuelTypes?: string[];
    applicableStations?: string[];
    maxUses?: number;
    raffleTickets?: number;
    termsAndConditions?: string;
    codePrefix?: string;
}

@Injectable()
export class CouponIssuanceApplicationService {
    constructor(
        @Inject(COUPON_REPOSITORY) private readonly couponRepository: ICouponRepository,
        @Inject(CAMPAIGN_REPOSITORY) private readonly campaignRepository: ICampaignRepository,
        @Inject(CLOCK) private readonly clock: Clock,
        private readonly signer: CouponTokenSigner,
        private readonly keys: SigningKeyProvider,
        private readonly commandValidator: CommandValidator,
        private readonly eventPublisher: DomainEventPublisher,
        private readonly logger: CustomLoggerService,
    ) { }

    /**
     * Generates `count` signed coupons for a campaign. Unset terms fall back
     * to the campaign's window, default discount and raffle tickets.
     */
    async issueCoupons(command: IssueCouponsCommand): Promise<Coupon[]> {
        const dto = await this.commandValidator.validate(IssueCouponsDto, command);

        const campaign = await this.campaignRepository.findById(dto.campaignId);
        if (!campaign) {
            throw new NotFoundException(`Campaign ${dto.campaignId} not found`);
        }
        if (!campaign.status.allowsIssuance) {
            throw new ConflictException(`Campaign ${campaign.id} is ${campaign.status.value} and cannot issue coupons`);
        }
        if (!campaign.canIssue(dto.count)) {
            throw new ConflictException(`Campaign ${campaign.id} has capacity for ${campaign.remainingCapacity ?? 0} more coupons`);
        }

        const validFrom = dto.validFrom ?? campaign.validity.validFrom;
        const validUntil = dto.validUntil ?? campaign.validity.validUntil;
        if (validFrom.getTime() > validUntil.getTime()) {
            throw new BadRequestException('validFrom must be before or equal to validUntil');
        }
        const discount = dto.discount ? this.toDiscount(dto.discount) : campaign.defaultDiscount;

        const previousCount = await this.campaignRepository.reserveCouponAllocation(campaign.id, dto.count);
        if (previousCount === null) {
            throw new ConflictException(`Campaign ${campaign.id} can no longer issue ${dto.count} coupons`);
        }

        const now = this.clock.now();
        const algorithm = this.keys.couponAlgorithm(campaign.id);
        const codes = this.generateCodes(dto.count, dto.codePrefix);

        const coupons = codes.map((couponCode, index) => {
            const signed = this.signer.signCouponToken(
                {
                    campaignId: campaign.id,
                    couponCode,
                    issuedAt: now,
                    sequence: previousCount + index + 1,
                },
                algorithm,
            );

            return Coupon.issue({
                id: randomUUID(),
                campaignId: campaign.id,
                token: signed.token,
                tokenSignature: signed.signature,
                couponCode,
                issuedAt: signed.issuedAt,
                validFrom,
                validUntil,
                discount,
                minimumPurchaseCents: dto.minimumPurchaseCents,
                applicableFuelTypes: dto.applicableFuelTypes,
                applicableStations: dto.applicableStations,
                maxUses: dto.maxUses,
                raffleTickets: dto.raffleTickets ?? campaign.defaultRaffleTickets,
                termsAndConditions: dto.termsAndConditions,
            });
        });

        try {
            await this.couponRepository.insertMany(coupons);
        } catch (error) {
            await this.campaignRepository.releaseCouponAllocation(campaign.id, dto.count);
            throw error;
        }

        for (const coupon of coupons) {
            this.eventPublisher.publishEventsFromAggregate(coupon);
        }

        this.logger.logBusinessEvent('coupons_issued', {
            campaignId: campaign.id,
            count: coupons.length,
            firstSequence: previousCount + 1,
        });

        return coupons;
    }

    private generateCodes(count: number, prefix?: string): string[] {
        const codes = new Set<string>();
        while (codes.size < count) {
            codes.add(CouponCode.generate(prefix).value);
        }
        return [...codes];
    }

    private toDiscount(terms: DiscountTermsDto): Discount {
        switch (terms.type) {
            case 'fixed':
                if (terms.amountCents === undefined) {
                    throw new BadRequestException('discount.amountCents is required for a fixed discount');
                }
                return Discount.fixed(terms.amountCents);
            case 'percentage':
                if (terms.percentage === undefined) {
                    throw new BadRequestException('discount.percentage is required for a percentage discount');
                }
                return Discount.percentage(terms.percentage);
            case 'none':
                return Discount.none();
        }
    }
}
