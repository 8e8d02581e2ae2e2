export * from './db.module';
export * from './db.service';
export * from './models/listing.record';
export * from './models/purchase.record';
export * from './pagination';
export * from './store';
export * from './in-memory.store';
