export * from './coupon.errors';
