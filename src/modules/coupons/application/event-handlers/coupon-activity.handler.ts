import { Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { CustomLoggerService } from '../../../../common/services/logger.service';

/**
 * Writes the coupon lifecycle to the business log. Listeners of other
 * contexts subscribe to the same event names.
 */
@Injectable()
export class CouponActivityHandler {
    constructor(private readonly logger: CustomLoggerService) { }

    @OnEvent('coupon.issued')
    handleIssued(payload: Record<string, unknown>): void {
        this.logger.debug('Coupon issued', { event: 'coupon.issued', ...payload });
    }

    @OnEvent('coupon.used_up')
    handleUsedUp(payload: Record<string, unknown>): void {
        this.logger.logBusinessEvent('coupon_used_up', payload);
    }

    @OnEvent('coupon.status_changed')
    handleStatusChanged(payload: Record<string, unknown>): void {
        this.logger.logBusinessEvent('coupon_status_changed', payload);
    }
}
