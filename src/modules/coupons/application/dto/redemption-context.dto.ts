import { IsInt, IsNotEmpty, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export class RedemptionContextDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(64)
    stationId!: string;

    @IsOptional()
    @IsString()
    @IsNotEmpty()
    @MaxLength(32)
    fuelType?: string;

    @IsOptional()
    @IsInt()
    @Min(0)
    purchaseAmountCents?: number;
}
