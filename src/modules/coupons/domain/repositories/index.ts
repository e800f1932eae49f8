export * from './coupon.repository.interface';
