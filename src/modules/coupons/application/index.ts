export { CouponValidationApplicationService } from './coupon-validation-application.service';
export { CouponUsageApplicationService } from './coupon-usage-application.service';
export type { ConsumeUseOptions } from './coupon-usage-application.service';
export { CouponIntegrityApplicationService } from './coupon-integrity-application.service';
export { CouponIssuanceApplicationService } from './coupon-issuance-application.service';
export type { DiscountTermsInput, IssueCouponsCommand } from './coupon-issuance-application.service';
export { StationAccessApplicationService } from './station-access-application.service';
export type { IssuedStationToken } from './station-access-application.service';
