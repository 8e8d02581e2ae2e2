export * from './common.constant';
export * from './listing.type';
export * from './marketplace.error';
export * from './events';
