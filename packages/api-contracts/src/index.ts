export * from './common/enums.js';
export * from './common/errors.js';

export * from './entities/allocation.js';
export * from './entities/keyspace.js';

export * from './endpoints/allocations/create.js';
export * from './endpoints/allocations/batch.js';
export * from './endpoints/allocations/get.js';
export * from './endpoints/allocations/history.js';
export * from './endpoints/allocations/upload.js';
export * from './endpoints/allocations/status.js';

export * from './endpoints/links/resolve.js';

export * from './endpoints/admin/keyspace.js';
export * from './endpoints/admin/reserved.js';
export * from './endpoints/admin/migrations.js';
