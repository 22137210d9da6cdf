export * from './services/trophic';
export { default } from './services/trophic';
export { AppError } from './utils/errors';
export type { ErrorDetails } from './utils/errors';
