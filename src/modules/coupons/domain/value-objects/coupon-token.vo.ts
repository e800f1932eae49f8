import { ValueObject } from '../../../../shared/domain/base/value-object.base';
import { InvalidTokenFormatError } from '../errors/coupon.errors';

export const TOKEN_PREFIX = 'CPN';
export const TOKEN_VERSION = 'v1';
export const TOKEN_SEPARATOR = '_';

const MAX_CAMPAIGN_ID = 999_999;
const SEQUENCE_MODULUS = 1_000_000;

// CPN_v1_<campaign>_<sequence>_<yyyyMMddHHmmss>_<nonce>_<code>
const TOKEN_PATTERN = /^CPN_v1_(\d{6})_(\d{6})_(\d{14})_([A-Z0-9]{8})_([A-Z0-9-]{6,50})$/;
const NONCE_PATTERN = /^[A-Z0-9]{8}$/;
const CODE_PATTERN = /^[A-Z0-9-]{6,50}$/;

interface CouponTokenProps {
    readonly raw: string;
    readonly campaignId: number;
    readonly sequence: number;
    readonly issuedAt: Date;
    readonly nonce: string;
    readonly couponCode: string;
}

export interface CouponTokenComponents {
    campaignId: number;
    sequence: number;
    issuedAt: Date;
    nonce: string;
    couponCode: string;
}

export class CouponToken extends ValueObject<CouponTokenProps> {
    private constructor(props: CouponTokenProps) {
        super(props);
    }

    get value(): string { return this.props.raw; }
    get campaignId(): number { return this.props.campaignId; }
    get sequence(): number { return this.props.sequence; }
    /** Second precision, UTC. */
    get issuedAt(): Date { return this.props.issuedAt; }
    get nonce(): string { return this.props.nonce; }
    get couponCode(): string { return this.props.couponCode; }

    static compose(components: CouponTokenComponents): CouponToken {
        const { campaignId, sequence, issuedAt, nonce, couponCode } = components;

        if (!Number.isInteger(campaignId) || campaignId < 1 || campaignId > MAX_CAMPAIGN_ID) {
            throw new Error(`Campaign id must be an integer between 1 and ${MAX_CAMPAIGN_ID}`);
        }
        if (!Number.isInteger(sequence) || sequence < 0) {
            throw new Error('Token sequence must be a non-negative integer');
        }
        if (!NONCE_PATTERN.test(nonce)) {
            throw new Error('Token nonce must be 8 uppercase alphanumeric characters');
        }
        if (!CODE_PATTERN.test(couponCode)) {
            throw new Error('Coupon code is not valid inside a token');
        }

        const wrappedSequence = sequence % SEQUENCE_MODULUS;
        const raw = [
            TOKEN_PREFIX,
            TOKEN_VERSION,
            pad(campaignId, 6),
            pad(wrappedSequence, 6),
            formatTokenTimestamp(issuedAt),
            nonce,
            couponCode,
        ].join(TOKEN_SEPARATOR);

        return CouponToken.parse(raw);
    }

    static parse(raw: string): CouponToken {
        const token = CouponToken.tryParse(raw);
        if (!token) {
            throw new InvalidTokenFormatError();
        }
        return token;
    }

    static tryParse(raw: string): CouponToken | null {
        const match = TOKEN_PATTERN.exec(raw);
        if (!match) return null;

        const [, campaignId, sequence, timestamp, nonce, couponCode] = match;
        const issuedAt = parseTokenTimestamp(timestamp);
        if (!issuedAt) return null;

        return new CouponToken({
            raw,
            campaignId: Number(campaignId),
            sequence: Number(sequence),
            issuedAt,
            nonce,
            couponCode,
        });
    }

    static isWellFormed(raw: string): boolean {
        return CouponToken.tryParse(raw) !== null;
    }

    protected equalsCore(other: CouponToken): boolean {
        return this.props.raw === other.props.raw;
    }
}

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0');
}

export function formatTokenTimestamp(date: Date): string {
    return [
        pad(date.getUTCFullYear(), 4),
        pad(date.getUTCMonth() + 1, 2),
        pad(date.getUTCDate(), 2),
        pad(date.getUTCHours(), 2),
        pad(date.getUTCMinutes(), 2),
        pad(date.getUTCSeconds(), 2),
    ].join('');
}

/**
 * Returns null for strings that are not a real calendar instant (month 13, Feb 30...).
 */
export function parseTokenTimestamp(value: string): Date | null {
    if (!/^\d{14}$/.test(value)) return null;

    const year = Number(value.slice(0, 4));
    const month = Number(value.slice(4, 6));
    const day = Number(value.slice(6, 8));
    const hours = Number(value.slice(8, 10));
    const minutes = Number(value.slice(10, 12));
    const seconds = Number(value.slice(12, 14));

    const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
    if (formatTokenTimestamp(date) !== value) return null;
    return date;
}
