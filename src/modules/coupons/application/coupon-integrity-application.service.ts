import { Inject, Injectable, NotFoundException } from '@nestjs/common';

import type { ICouponRepository } from '../domain/repositories/coupon.repository.interface';
import { COUPON_REPOSITORY } from '../domain/repositories/coupon.repository.interface';
import { Coupon } from '../domain/aggregates/coupon.aggregate';
import { CouponIntegrityPolicy } from '../domain/policies/coupon-integrity.policy';
import type { CouponRecord } from '../domain/interfaces/coupon-record.interface';
import type { IntegrityReport } from '../domain/interfaces/integrity.interface';
import { CouponMapper } from '../infrastructure/persistence/coupon.mapper';
import { CouponTokenVerifier } from '../infrastructure/crypto/coupon-token.verifier';
import { SigningKeyProvider } from '../infrastructure/crypto/signing-key.provider';

import { CustomLoggerService } from '../../../common/services/logger.service';

/**
 * Data-quality audit over stored coupons. Never part of the redemption
 * path and never mutates what it inspects.
 */
@Injectable()
export class CouponIntegrityApplicationService {
    constructor(
        @Inject(COUPON_REPOSITORY) private readonly couponRepository: ICouponRepository,
        private readonly verifier: CouponTokenVerifier,
        private readonly keys: SigningKeyProvider,
        private readonly logger: CustomLoggerService,
    ) { }

    checkIntegrity(target: Coupon | CouponRecord): IntegrityReport {
        const record = target instanceof Coupon ? CouponMapper.toRecord(target) : target;

        const wellFormed = this.verifier.isWellFormed(record.token);
        const signatureValid = this.verifier.verifySignature(
            record.token,
            record.tokenSignature,
            {
                campaignId: record.campaignId,
                couponCode: record.couponCode,
                issuedAt: record.issuedAt,
            },
            this.keys.couponAlgorithm(record.campaignId),
        );

        const issues = CouponIntegrityPolicy.inspect(record, { wellFormed, signatureValid });
        return {
            couponId: record.id,
            isIntact: issues.length === 0,
            issues,
        };
    }

    async checkIntegrityById(couponId: string): Promise<IntegrityReport> {
        const record = await this.couponRepository.findRecordById(couponId);
        if (!record) {
            throw new NotFoundException(`Coupon ${couponId} not found`);
        }
        return this.checkIntegrity(record);
    }

    /**
     * Audits every stored coupon of a campaign and returns only the reports
     * with issues.
     */
    async auditCampaign(campaignId: number): Promise<IntegrityReport[]> {
        const startedAt = Date.now();
        const records = await this.couponRepository.findRecordsByCampaign(campaignId);
        const broken = records
            .map(record => this.checkIntegrity(record))
            .filter(report => !report.isIntact);

        this.logger.logBusinessEvent('coupon_integrity_audit', {
            campaignId,
            audited: records.length,
            corrupted: broken.length,
        });
        this.logger.logPerformance('coupon_integrity_audit', Date.now() - startedAt, { campaignId });

        return broken;
    }
}
