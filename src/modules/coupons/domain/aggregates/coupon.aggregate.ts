import { AggregateRoot } from '../../../../shared/domain/base/aggregate-root.base';
import {
    CouponCode,
    CouponStatus,
    CouponStatusValue,
    Discount,
    UsageLimit,
    ValidityWindow,
} from '../value-objects/index';
import { CouponIssuedEvent } from '../events/coupon-issued.event';
import { CouponUsedEvent } from '../events/coupon-used.event';
import { CouponUsedUpEvent } from '../events/coupon-used-up.event';
import { CouponStatusChangedEvent } from '../events/coupon-status-changed.event';
import { CouponNotUsableError, InvalidCouponTransitionError } from '../errors/coupon.errors';
import type { SignedCouponFields } from '../interfaces/coupon-record.interface';

export interface CouponProps {
    campaignId: number;
    token: string;
    tokenSignature: string;
    couponCode: CouponCode;
    issuedAt: Date;
    status: CouponStatus;
    validity: ValidityWindow;
    discount: Discount;
    minimumPurchaseCents: number | null;
    applicableFuelTypes: string[];
    applicableStations: string[];
    usage: UsageLimit;
    raffleTickets: number;
    termsAndConditions: string | null;
    createdAt: Date;
    updatedAt: Date;
}

export class Coupon extends AggregateRoot<CouponProps> {
    private constructor(id: string, props: CouponProps) {
        super(id, props);
    }

    // Getters
    get campaignId(): number { return this.props.campaignId; }
    get token(): string { return this.props.token; }
    get tokenSignature(): string { return this.props.tokenSignature; }
    get couponCode(): CouponCode { return this.props.couponCode; }
    get issuedAt(): Date { return this.props.issuedAt; }
    get status(): CouponStatus { return this.props.status; }
    get validity(): ValidityWindow { return this.props.validity; }
    get discount(): Discount { return this.props.discount; }
    get minimumPurchaseCents(): number | null { return this.props.minimumPurchaseCents; }
    get applicableFuelTypes(): readonly string[] { return this.props.applicableFuelTypes; }
    get applicableStations(): readonly string[] { return this.props.applicableStations; }
    get usage(): UsageLimit { return this.props.usage; }
    get raffleTickets(): number { return this.props.raffleTickets; }
    get termsAndConditions(): string | null { return this.props.termsAndConditions; }
    get createdAt(): Date { return this.props.createdAt; }
    get updatedAt(): Date { return this.props.updatedAt; }

    get signedFields(): SignedCouponFields {
        return {
            campaignId: this.props.campaignId,
            couponCode: this.props.couponCode.value,
            issuedAt: this.props.issuedAt,
        };
    }

    get hasRemainingUses(): boolean {
        return !this.props.usage.isExhausted;
    }

    static issue(params: {
        id: string;
        campaignId: number;
        token: string;
        tokenSignature: string;
        couponCode: string;
        issuedAt: Date;
        validFrom: Date;
        validUntil: Date;
        discount: Discount;
        minimumPurchaseCents?: number;
        applicableFuelTypes?: string[];
        applicableStations?: string[];
        maxUses?: number;
        raffleTickets?: number;
        termsAndConditions?: string;
    }): Coupon {
        const coupon = new Coupon(params.id, {
            campaignId: params.campaignId,
            token: params.token,
            tokenSignature: params.tokenSignature,
            couponCode: CouponCode.create(params.couponCode),
            issuedAt: params.issuedAt,
            status: CouponStatus.active(),
            validity: ValidityWindow.create(params.validFrom, params.validUntil),
            discount: params.discount,
            minimumPurchaseCents: params.minimumPurchaseCents ?? null,
            applicableFuelTypes: params.applicableFuelTypes ?? [],
            applicableStations: params.applicableStations ?? [],
            usage: UsageLimit.create(params.maxUses ?? null, 0),
            raffleTickets: params.raffleTickets ?? 1,
            termsAndConditions: params.termsAndConditions ?? null,
            createdAt: params.issuedAt,
            updatedAt: params.issuedAt,
        });

        coupon.addDomainEvent(new CouponIssuedEvent(
            coupon.id,
            coupon.campaignId,
            coupon.couponCode.value,
            params.issuedAt,
        ));

        return coupon;
    }

    static reconstitute(id: string, props: CouponProps): Coupon {
        return new Coupon(id, props);
    }

    appliesToStation(stationId: string): boolean {
        if (this.props.applicableStations.length === 0) return true;
        return this.props.applicableStations.includes(stationId.trim());
    }

    appliesToFuelType(fuelType: string): boolean {
        if (this.props.applicableFuelTypes.length === 0) return true;
        const wanted = fuelType.trim().toUpperCase();
        return this.props.applicableFuelTypes.some(type => type.trim().toUpperCase() === wanted);
    }

    meetsMinimumPurchase(purchaseAmountCents: number): boolean {
        if (this.props.minimumPurchaseCents === null) return true;
        return purchaseAmountCents >= this.props.minimumPurchaseCents;
    }

    /**
     * Consumes one use. Reaching the ceiling moves the coupon to USED_UP in the
     * same step, so no state has currentUses == maxUses with status ACTIVE.
     */
    recordUse(now: Date, stationId?: string): void {
        if (!this.props.status.isActive) {
            throw new CouponNotUsableError(`status is ${this.props.status.value}`);
        }
        if (this.props.usage.isExhausted) {
            throw new CouponNotUsableError('maximum usage limit reached');
        }
        if (this.props.discount.isConflicting) {
            throw new CouponNotUsableError('conflicting discount terms');
        }

        this.props.usage = this.props.usage.recordUse();
        this.props.updatedAt = now;

        this.addDomainEvent(new CouponUsedEvent(
            this.id,
            this.props.campaignId,
            this.props.couponCode.value,
            this.props.usage.currentUses,
            this.props.usage.remaining,
            stationId,
            now,
        ));

        const { maxUses } = this.props.usage;
        if (maxUses !== null && this.props.usage.isExhausted) {
            this.transitionTo('USED_UP', now, 'maximum usage limit reached');
            this.addDomainEvent(new CouponUsedUpEvent(this.id, this.props.campaignId, maxUses, now));
        }
    }

    activate(now: Date): void {
        this.transitionTo('ACTIVE', now);
    }

    deactivate(now: Date): void {
        this.transitionTo('INACTIVE', now);
    }

    cancel(now: Date, reason?: string): void {
        this.transitionTo('CANCELLED', now, reason);
    }

    expire(now: Date): void {
        this.transitionTo('EXPIRED', now, 'validity window elapsed');
    }

    private transitionTo(next: CouponStatusValue, now: Date, reason?: string): void {
        const current = this.props.status;
        if (!current.canTransitionTo(next)) {
            throw new InvalidCouponTransitionError(current.value, next);
        }

        this.props.status = CouponStatus.of(next);
        this.props.updatedAt = now;

        this.addDomainEvent(new CouponStatusChangedEvent(this.id, current.value, next, reason, now));
    }
}
