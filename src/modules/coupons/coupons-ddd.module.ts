import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { CommonModule } from '../../common/common.module';
import { CampaignsDddModule } from '../campaigns/campaigns-ddd.module';
import { COUPON_REPOSITORY } from './domain/repositories/index';
import { CouponRepository } from './infrastructure/persistence/index';
import {
    CouponTokenSigner,
    CouponTokenVerifier,
    SigningKeyProvider,
    StationTokenSigner,
} from './infrastructure/crypto/index';
import {
    CouponIntegrityApplicationService,
    CouponIssuanceApplicationService,
    CouponUsageApplicationService,
    CouponValidationApplicationService,
    StationAccessApplicationService,
} from './application/index';
import { CouponActivityHandler } from './application/event-handlers/coupon-activity.handler';
import { CLOCK, SystemClock } from '../../shared/domain/clock';

@Module({
    imports: [
        DatabaseModule,
        CommonModule,
        CampaignsDddModule,
    ],
    providers: [
        {
            provide: COUPON_REPOSITORY,
            useClass: CouponRepository,
        },
        {
            provide: CLOCK,
            useClass: SystemClock,
        },
        CouponTokenSigner,
        CouponTokenVerifier,
        StationTokenSigner,
        SigningKeyProvider,
        CouponValidationApplicationService,
        CouponUsageApplicationService,
        CouponIntegrityApplicationService,
        CouponIssuanceApplicationService,
        StationAccessApplicationService,
        CouponActivityHandler,
    ],
    exports: [
        COUPON_REPOSITORY,
        CouponTokenSigner,
        CouponTokenVerifier,
        CouponValidationApplicationService,
        CouponUsageApplicationService,
        CouponIntegrityApplicationService,
        CouponIssuanceApplicationService,
        StationAccessApplicationService,
    ],
})
export class CouponsDddModule { }
