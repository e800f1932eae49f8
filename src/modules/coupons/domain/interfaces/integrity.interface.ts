export type IntegrityIssueCode =
    | 'INVALID_TOKEN_FORMAT'
    | 'INVALID_SIGNATURE'
    | 'INVALID_DATE_RANGE'
    | 'USAGE_OVERRUN'
    | 'CONFLICTING_DISCOUNT_TYPES'
    | 'STATUS_USAGE_MISMATCH';

export interface IntegrityIssue {
    readonly code: IntegrityIssueCode;
    readonly message: string;
}

export interface IntegrityReport {
    readonly couponId: string;
    readonly isIntact: boolean;
    readonly issues: readonly IntegrityIssue[];
}
