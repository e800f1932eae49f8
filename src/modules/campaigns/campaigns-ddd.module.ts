import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { CAMPAIGN_REPOSITORY } from './domain/repositories/index';
import { CampaignRepository } from './infrastructure/persistence/index';

@Module({
    imports: [DatabaseModule],
    providers: [
        {
            provide: CAMPAIGN_REPOSITORY,
            useClass: CampaignRepository,
        },
    ],
    exports: [CAMPAIGN_REPOSITORY],
})
export class CampaignsDddModule { }
