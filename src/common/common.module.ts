import { Module } from '@nestjs/common';
import { CustomLoggerService } from './services/logger.service';
import { CommandValidator } from './validation/command.validator';

@Module({
  providers: [
    {
      provide: CustomLoggerService,
      useClass: CustomLoggerService,
    },
    CommandValidator,
  ],
  exports: [
    CustomLoggerService,
    CommandValidator,
  ],
})
export class CommonModule {}
