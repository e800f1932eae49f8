export * from './campaign.repository.interface';
