import { Inject, Module, OnApplicationShutdown } from '@nestjs/common';
import { DatabaseClient } from './database.client';
import { DatabaseConfig } from './database.config';
import { CustomLoggerService } from '../common/services/logger.service';
import { CommonModule } from '../common/common.module';

export const DATABASE_CLIENT = Symbol('DATABASE_CLIENT');

@Module({
  imports: [CommonModule],
  providers: [
    {
      provide: DATABASE_CLIENT,
      inject: [CustomLoggerService],
      useFactory: async (logger: CustomLoggerService): Promise<DatabaseClient> => {
        const config = DatabaseConfig.fromEnv();
        const client = await DatabaseClient.connect(config);
        logger.log('Database connection established', { target: config.describe() });
        return client;
      },
    },
  ],
  exports: [DATABASE_CLIENT],
})
export class DatabaseModule implements OnApplicationShutdown {
  constructor(@Inject(DATABASE_CLIENT) private readonly client: DatabaseClient) {}

  async onApplicationShutdown(): Promise<void> {
    await this.client.close();
  }
}
