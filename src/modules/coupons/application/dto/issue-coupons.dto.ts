import { Type } from 'class-transformer';
import {
    ArrayMaxSize,
    IsArray,
    IsDate,
    IsIn,
    IsInt,
    IsNotEmpty,
    IsNumber,
    IsOptional,
    IsString,
    Matches,
    Max,
    MaxLength,
    Min,
    ValidateIf,
    ValidateNested,
} from 'class-validator';

export const MAX_COUPONS_PER_ISSUE = 10_000;

export class DiscountTermsDto {
    @IsIn(['fixed', 'percentage', 'none'])
    type!: 'fixed' | 'percentage' | 'none';

    @ValidateIf((terms: DiscountTermsDto) => terms.type === 'fixed')
    @IsInt()
    @Min(1)
    amountCents?: number;

    @ValidateIf((terms: DiscountTermsDto) => terms.type === 'percentage')
    @IsNumber({ maxDecimalPlaces: 2 })
    @Min(0.01)
    @Max(100)
    percentage?: number;
}

export class IssueCouponsDto {
    @IsInt()
    @Min(1)
    @Max(999_999)
    campaignId!: number;

    @IsInt()
    @Min(1)
    @Max(MAX_COUPONS_PER_ISSUE)
    count!: number;

    @IsOptional()
    @Type(() => Date)
    @IsDate()
    validFrom?: Date;

    @IsOptional()
    @Type(() => Date)
    @IsDate()
    validUntil?: Date;

    @IsOptional()
    @ValidateNested()
    @Type(() => DiscountTermsDto)
    discount?: DiscountTermsDto;

    @IsOptional()
    @IsInt()
    @Min(0)
    minimumPurchaseCents?: number;

    @IsOptional()
    @IsArray()
    @ArrayMaxSize(50)
    @IsString({ each: true })
    @IsNotEmpty({ each: true })
    applicableFuelTypes?: string[];

    @IsOptional()
    @IsArray()
    @ArrayMaxSize(500)
    @IsString({ each: true })
    @IsNotEmpty({ each: true })
    applicableStations?: string[];

    @IsOptional()
    @IsInt()
    @Min(1)
    maxUses?: number;

    @IsOptional()
    @IsInt()
    @Min(0)
    raffleTickets?: number;

    @IsOptional()
    @IsString()
    @MaxLength(2000)
    termsAndConditions?: string;

    @IsOptional()
    @IsString()
    @Matches(/^[A-Z0-9]{2,10}$/)
    codePrefix?: string;
}
