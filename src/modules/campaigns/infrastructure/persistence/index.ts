export * from './campaign.mapper';
export * from './campaign.repository';
