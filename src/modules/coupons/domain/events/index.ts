export * from './coupon-issued.event';
export * from './coupon-status-changed.event';
export * from './coupon-used.event';
export * from './coupon-used-up.event';
