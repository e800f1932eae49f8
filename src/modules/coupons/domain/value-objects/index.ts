export * from './coupon-code.vo';
export * from './coupon-status.vo';
export * from './coupon-token.vo';
export * from './discount.vo';
export * from './usage-limit.vo';
export * from './validity-window.vo';
