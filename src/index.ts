export * from './lib/pagination';
export { logger } from './lib/logger';
export { createPaginatedStore, type PaginatedStore } from './stores/paginatedStore';
