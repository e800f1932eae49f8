import { registerAs } from '@nestjs/config';

export type CouponSigningAlgorithm = 'hmac-sha256' | 'rsa-sha256';
export type CouponSigningScope = 'global' | 'campaign';

export interface CouponSecurityConfig {
  signingAlgorithm: CouponSigningAlgorithm;
  signingSecret?: string;
  signingScope: CouponSigningScope;
  signingPrivateKey?: string;
  signingPublicKey?: string;
  tokenMaxAgeHours: number;
  consumeMaxAttempts: number;
  stationPrivateKey?: string;
  stationPublicKey?: string;
  stationTokenTtlMinutes: number;
}

export const COUPON_SECURITY_CONFIG_KEY = 'couponSecurity';

const DEFAULT_TOKEN_MAX_AGE_HOURS = 24;
const DEFAULT_CONSUME_MAX_ATTEMPTS = 3;
const DEFAULT_STATION_TOKEN_TTL_MINUTES = 60;
const MIN_SECRET_LENGTH = 16;

function positiveNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  const value = raw === undefined || raw === '' ? fallback : Number(raw);

  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${key} must be a positive number`);
  }

  return value;
}

function optionalPem(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  // Keys passed through single-line env vars carry literal \n sequences
  return raw.replace(/\\n/g, '\n');
}

export function parseCouponSecurityConfig(env: NodeJS.ProcessEnv): CouponSecurityConfig {
  const algorithm = env.COUPON_SIGNING_ALGORITHM ?? 'hmac-sha256';
  if (algorithm !== 'hmac-sha256' && algorithm !== 'rsa-sha256') {
    throw new Error('COUPON_SIGNING_ALGORITHM must be hmac-sha256 or rsa-sha256');
  }

  const scope = env.COUPON_SIGNING_SCOPE ?? 'global';
  if (scope !== 'global' && scope !== 'campaign') {
    throw new Error('COUPON_SIGNING_SCOPE must be global or campaign');
  }

  const signingSecret = env.COUPON_SIGNING_SECRET;
  const signingPrivateKey = optionalPem(env, 'COUPON_SIGNING_PRIVATE_KEY');
  const signingPublicKey = optionalPem(env, 'COUPON_SIGNING_PUBLIC_KEY');

  if (algorithm === 'hmac-sha256') {
    if (!signingSecret || signingSecret.length < MIN_SECRET_LENGTH) {
      throw new Error(`COUPON_SIGNING_SECRET must be at least ${MIN_SECRET_LENGTH} characters`);
    }
  } else if (!signingPublicKey) {
    throw new Error('COUPON_SIGNING_PUBLIC_KEY is required for rsa-sha256');
  }

  const consumeMaxAttempts = positiveNumber(env, 'COUPON_CONSUME_MAX_ATTEMPTS', DEFAULT_CONSUME_MAX_ATTEMPTS);
  if (!Number.isInteger(consumeMaxAttempts)) {
    throw new Error('COUPON_CONSUME_MAX_ATTEMPTS must be an integer');
  }

  return {
    signingAlgorithm: algorithm,
    signingSecret,
    signingScope: scope,
    signingPrivateKey,
    signingPublicKey,
    tokenMaxAgeHours: positiveNumber(env, 'COUPON_TOKEN_MAX_AGE_HOURS', DEFAULT_TOKEN_MAX_AGE_HOURS),
    consumeMaxAttempts,
    stationPrivateKey: optionalPem(env, 'STATION_TOKEN_PRIVATE_KEY'),
    stationPublicKey: optionalPem(env, 'STATION_TOKEN_PUBLIC_KEY'),
    stationTokenTtlMinutes: positiveNumber(env, 'STATION_TOKEN_TTL_MINUTES', DEFAULT_STATION_TOKEN_TTL_MINUTES),
  };
}

export default registerAs(COUPON_SECURITY_CONFIG_KEY, (): CouponSecurityConfig => parseCouponSecurityConfig(process.env));
