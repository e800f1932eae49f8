export * from './coupon-record.interface';
export * from './integrity.interface';
export * from './validation.interface';
