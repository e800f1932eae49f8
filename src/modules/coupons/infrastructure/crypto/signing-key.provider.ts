import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHmac, createPrivateKey, createPublicKey, KeyObject } from 'node:crypto';
import {
    COUPON_SECURITY_CONFIG_KEY,
    CouponSecurityConfig,
} from '../../../../common/config/coupon-security.config';
import { SigningKeyUnavailableError } from '../../domain/errors/coupon.errors';
import {
    HmacSha256Algorithm,
    RsaSha256Algorithm,
    TokenSignatureAlgorithm,
} from './token-signature.algorithm';

const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

/**
 * Resolves signing material from configuration. With the campaign scope,
 * each campaign signs with an HMAC key derived from the shared secret.
 */
@Injectable()
export class SigningKeyProvider {
    private readonly config: CouponSecurityConfig;
    private readonly algorithms = new Map<string, TokenSignatureAlgorithm>();
    private stationKeys?: { privateKey?: KeyObject; publicKey?: KeyObject };

    constructor(configService: ConfigService) {
        const config = configService.get<CouponSecurityConfig>(COUPON_SECURITY_CONFIG_KEY);
        if (!config) {
            throw new SigningKeyUnavailableError('coupon tokens (couponSecurity config not loaded)');
        }
        this.config = config;
    }

    get tokenMaxAgeMs(): number {
        return this.config.tokenMaxAgeHours * HOUR_MS;
    }

    get consumeMaxAttempts(): number {
        return this.config.consumeMaxAttempts;
    }

    get stationTokenTtlMs(): number {
        return this.config.stationTokenTtlMinutes * MINUTE_MS;
    }

    couponAlgorithm(campaignId: number): TokenSignatureAlgorithm {
        const cacheKey = this.config.signingScope === 'campaign' ? `campaign:${campaignId}` : 'global';
        const cached = this.algorithms.get(cacheKey);
        if (cached) return cached;

        const algorithm = this.buildAlgorithm(campaignId);
        this.algorithms.set(cacheKey, algorithm);
        return algorithm;
    }

    stationPrivateKey(): KeyObject {
        const { privateKey } = this.loadStationKeys();
        if (!privateKey) {
            throw new SigningKeyUnavailableError('station tokens (STATION_TOKEN_PRIVATE_KEY)');
        }
        return privateKey;
    }

    stationPublicKey(): KeyObject {
        const { publicKey } = this.loadStationKeys();
        if (!publicKey) {
            throw new SigningKeyUnavailableError('station tokens (STATION_TOKEN_PUBLIC_KEY)');
        }
        return publicKey;
    }

    private buildAlgorithm(campaignId: number): TokenSignatureAlgorithm {
        if (this.config.signingAlgorithm === 'rsa-sha256') {
            if (!this.config.signingPublicKey) {
                throw new SigningKeyUnavailableError('coupon tokens (COUPON_SIGNING_PUBLIC_KEY)');
            }
            return new RsaSha256Algorithm(
                createPublicKey(this.config.signingPublicKey),
                this.config.signingPrivateKey ? createPrivateKey(this.config.signingPrivateKey) : undefined,
            );
        }

        const secret = this.config.signingSecret;
        if (!secret) {
            throw new SigningKeyUnavailableError('coupon tokens (COUPON_SIGNING_SECRET)');
        }
        if (this.config.signingScope === 'global') {
            return new HmacSha256Algorithm(secret);
        }
        const derived = createHmac('sha256', secret).update(`campaign:${campaignId}`).digest();
        return new HmacSha256Algorithm(derived);
    }

    private loadStationKeys(): { privateKey?: KeyObject; publicKey?: KeyObject } {
        if (!this.stationKeys) {
            const { stationPrivateKey, stationPublicKey } = this.config;
            const privateKey = stationPrivateKey ? createPrivateKey(stationPrivateKey) : undefined;
            // The public half can be derived when only the private key is configured.
            const publicKey = stationPublicKey
                ? createPublicKey(stationPublicKey)
                : privateKey ? createPublicKey(privateKey) : undefined;
            this.stationKeys = { privateKey, publicKey };
        }
        return this.stationKeys;
    }
}
