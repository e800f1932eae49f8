import { ConfigService } from '@nestjs/config';
import { createHmac, generateKeyPairSync } from 'node:crypto';
import { SigningKeyProvider } from './signing-key.provider';
import { HmacSha256Algorithm } from './token-signature.algorithm';
import { SigningKeyUnavailableError } from '../../domain/errors/coupon.errors';
import type { CouponSecurityConfig } from '../../../../common/config/coupon-security.config';
import { TEST_SIGNING_SECRET, testSecurityConfig } from '../../testing/coupon.fixtures';

function providerFor(overrides: Partial<CouponSecurityConfig> = {}): SigningKeyProvider {
    return new SigningKeyProvider(new ConfigService({ couponSecurity: testSecurityConfig(overrides) }));
}

describe('SigningKeyProvider', () => {
    it('should fail fast when the security config is not loaded', () => {
        expect(() => new SigningKeyProvider(new ConfigService({}))).toThrow(SigningKeyUnavailableError);
    });

    it('should expose durations in milliseconds', () => {
        const keys = providerFor({ tokenMaxAgeHours: 2, stationTokenTtlMinutes: 5, consumeMaxAttempts: 4 });

        expect(keys.tokenMaxAgeMs).toBe(7_200_000);
        expect(keys.stationTokenTtlMs).toBe(300_000);
        expect(keys.consumeMaxAttempts).toBe(4);
    });

    it('should share one algorithm across campaigns in the global scope', () => {
        const keys = providerFor();
        const message = 'message';

        expect(keys.couponAlgorithm(1)).toBe(keys.couponAlgorithm(2));
        expect(keys.couponAlgorithm(1).sign(message))
            .toBe(new HmacSha256Algorithm(TEST_SIGNING_SECRET).sign(message));
    });

    it('should derive a distinct key per campaign in the campaign scope', () => {
        const keys = providerFor({ signingScope: 'campaign' });
        const derived = createHmac('sha256', TEST_SIGNING_SECRET).update('campaign:7').digest();

        expect(keys.couponAlgorithm(7)).toBe(keys.couponAlgorithm(7));
        expect(keys.couponAlgorithm(7).sign('message')).toBe(new HmacSha256Algorithm(derived).sign('message'));
        expect(keys.couponAlgorithm(7).sign('message')).not.toBe(keys.couponAlgorithm(8).sign('message'));
    });

    it('should build an rsa algorithm from PEM keys', () => {
        const { publicKey, privateKey } = generateKeyPairSync('rsa', {
            modulusLength: 2048,
            publicKeyEncoding: { type: 'spki', format: 'pem' },
            privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
        });
        const keys = providerFor({
            signingAlgorithm: 'rsa-sha256',
            signingSecret: undefined,
            signingPublicKey: publicKey,
            signingPrivateKey: privateKey,
        });

        const algorithm = keys.couponAlgorithm(1);

        expect(algorithm.name).toBe('rsa-sha256');
        expect(algorithm.verify('message', algorithm.sign('message'))).toBe(true);
    });

    it('should derive the station public key from the private key', () => {
        const { privateKey } = generateKeyPairSync('rsa', {
            modulusLength: 2048,
            privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
            publicKeyEncoding: { type: 'spki', format: 'pem' },
        });
        const keys = providerFor({ stationPrivateKey: privateKey });

        expect(keys.stationPrivateKey().type).toBe('private');
        expect(keys.stationPublicKey().type).toBe('public');
    });

    it('should refuse station signing without a configured key', () => {
        const keys = providerFor();

        expect(() => keys.stationPrivateKey())
            .toThrow('No signing key configured for station tokens (STATION_TOKEN_PRIVATE_KEY)');
        expect(() => keys.stationPublicKey()).toThrow(SigningKeyUnavailableError);
    });
});
