import { BadRequestException, Inject, Injectable } from '@nestjs/common';

import { StationTokenSigner } from '../infrastructure/crypto/station-token.signer';
import type { StationTokenVerification } from '../infrastructure/crypto/station-token.signer';
import { SigningKeyProvider } from '../infrastructure/crypto/signing-key.provider';

import { CLOCK } from '../../../shared/domain/clock';
import type { Clock } from '../../../shared/domain/clock';
import { CustomLoggerService } from '../../../common/services/logger.service';

export interface IssuedStationToken {
    token: string;
    expiresAt: Date;
}

@Injectable()
export class StationAccessApplicationService {
    constructor(
        @Inject(CLOCK) private readonly clock: Clock,
        private readonly signer: StationTokenSigner,
        private readonly keys: SigningKeyProvider,
        private readonly logger: CustomLoggerService,
    ) { }

    signStationToken(stationId: string, dispenserId: string, expiresAt: Date): string {
        if (stationId.trim() === '' || dispenserId.trim() === '') {
            throw new BadRequestException('stationId and dispenserId are required');
        }
        if (expiresAt.getTime() <= this.clock.now().getTime()) {
            throw new BadRequestException('expiresAt must be in the future');
        }
        return this.signer.sign(stationId.trim(), dispenserId.trim(), expiresAt, this.keys.stationPrivateKey());
    }

    /** Signs a token valid for the configured TTL. */
    issueStationToken(stationId: string, dispenserId: string): IssuedStationToken {
        const expiresAt = new Date(this.clock.now().getTime() + this.keys.stationTokenTtlMs);
        const token = this.signStationToken(stationId, dispenserId, expiresAt);

        this.logger.logBusinessEvent('station_token_issued', {
            stationId,
            dispenserId,
            expiresAt: expiresAt.toISOString(),
        });

        return { token, expiresAt };
    }

    verifyStationToken(token: string): StationTokenVerification {
        const result = this.signer.verify(token, this.keys.stationPublicKey());
        if (!result.valid) {
            this.logger.logSecurityEvent('station_token_rejected', {
                reason: result.reason,
                stationId: result.reason === 'EXPIRED' ? result.payload.stationId : undefined,
            });
        }
        return result;
    }
}
