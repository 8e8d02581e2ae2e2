export * from './deploy';
export * from './diamond';
export * from './facets/admin.facet';
export * from './facets/buyer-whitelist.facet';
export * from './facets/collection-whitelist.facet';
export * from './facets/currency-whitelist.facet';
export * from './facets/facet';
export * from './facets/getter.facet';
export * from './facets/listing.facet';
export * from './guard/reentrancy.guard';
export * from './listing/listing.checks';
export * from './listing/listing.view';
export * from './payment/payment.distributor';
export * from './payment/payment.split';
export * from './payment/safe-transfer';
export * from './marketplace.module';
export * from './marketplace.service';
export * from './storage/indexed-set';
export * from './storage/listing.registry';
export * from './storage/marketplace.storage';
