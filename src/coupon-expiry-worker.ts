import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { CouponUsageApplicationService } from './modules/coupons/application/coupon-usage-application.service';
import { CustomLoggerService } from './common/services/logger.service';

const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

function sweepIntervalMs(): number {
  const parsed = Number(process.env.COUPON_EXPIRY_INTERVAL_MS);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_SWEEP_INTERVAL_MS;
}

/**
 * Periodic sweep that moves coupons past their validity window to EXPIRED.
 */
async function main() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: false,
  });

  const intervalMs = sweepIntervalMs();
  const usageService = app.get(CouponUsageApplicationService);
  const logger = app.get(CustomLoggerService);

  logger.log('Coupon expiry worker started', { intervalMs });

  const sweep = async () => {
    try {
      await usageService.expireOverdue();
    } catch (error) {
      logger.logError(error instanceof Error ? error : new Error(String(error)), {
        method: 'expireOverdue',
        workerType: 'coupon-expiry',
      });
    }
  };

  await sweep();

  const intervalId = setInterval(() => {
    void sweep();
  }, intervalMs);

  const shutdown = async () => {
    logger.log('Coupon expiry worker shutting down');
    clearInterval(intervalId);
    await app.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });
  process.on('unhandledRejection', (reason) => {
    logger.logError(reason instanceof Error ? reason : new Error(String(reason)), {
      method: 'unhandledRejection',
      workerType: 'coupon-expiry',
    });
    process.exit(1);
  });
}

main().catch((error: unknown) => {
  console.error('Coupon expiry worker failed to start', error);
  process.exit(1);
});
