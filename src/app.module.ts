import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { CommonModule } from './common/common.module';
import { SharedModule } from './shared/shared.module';
import { CouponsDddModule } from './modules/coupons/coupons-ddd.module';
import { CampaignsDddModule } from './modules/campaigns/campaigns-ddd.module';
import couponSecurityConfig from './common/config/coupon-security.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env.development',
      load: [couponSecurityConfig],
    }),
    EventEmitterModule.forRoot({
      wildcard: false,
      delimiter: '.',
      maxListeners: 10,
      ignoreErrors: false,
    }),
    CommonModule,
    SharedModule,
    CampaignsDddModule,
    CouponsDddModule,
  ],
})
export class AppModule {}
