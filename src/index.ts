import 'reflect-metadata';

export { AppModule } from './app.module';
export { CouponsDddModule } from './modules/coupons/coupons-ddd.module';
export { CampaignsDddModule } from './modules/campaigns/campaigns-ddd.module';

export * from './modules/coupons/application/index';
export * from './modules/coupons/domain/interfaces/index';
export * from './modules/coupons/domain/errors/index';
export * from './modules/coupons/domain/events/index';
export * from './modules/coupons/domain/value-objects/index';
export { Coupon } from './modules/coupons/domain/aggregates/coupon.aggregate';
export { COUPON_REPOSITORY } from './modules/coupons/domain/repositories/index';
export type { ICouponRepository, ExpectedUsageState } from './modules/coupons/domain/repositories/index';
export type { StationTokenPayload, StationTokenVerification } from './modules/coupons/infrastructure/crypto/index';

export { Campaign } from './modules/campaigns/domain/aggregates/campaign.aggregate';
export { CAMPAIGN_REPOSITORY } from './modules/campaigns/domain/repositories/index';
export type { ICampaignRepository } from './modules/campaigns/domain/repositories/index';

export { CLOCK, SystemClock } from './shared/domain/clock';
export type { Clock } from './shared/domain/clock';
export { parseCouponSecurityConfig } from './common/config/coupon-security.config';
export type { CouponSecurityConfig } from './common/config/coupon-security.config';
