export * from './http-exception.filter';
export * from './parse-address.pipe';
export * from './parse-bigint.pipe';
export * from './serialize';
