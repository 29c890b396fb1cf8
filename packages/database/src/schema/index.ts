// Export enums first (other schemas depend on them)
export * from './enums';

export * from './users';
export * from './plans';
export * from './subscriptions';
export * from './ledger';
export * from './billing-runs';
