export * from './coupon.mapper';
export * from './coupon.repository';
