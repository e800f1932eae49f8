import { Module, Global } from '@nestjs/common';
import { CommonModule } from '../common/common.module';
import { DomainEventPublisher } from './infrastructure/domain-event-publisher';

@Global()
@Module({
    imports: [
        CommonModule,
    ],
    providers: [
        DomainEventPublisher,
    ],
    exports: [
        DomainEventPublisher,
        CommonModule,
    ],
})
export class SharedModule { }
