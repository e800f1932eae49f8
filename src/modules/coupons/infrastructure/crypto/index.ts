export * from './coupon-token.signer';
export * from './coupon-token.verifier';
export * from './signing-key.provider';
export * from './station-token.signer';
export * from './token-signature.algorithm';
