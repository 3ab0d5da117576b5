export { IdSchema, OptionalDateSchema, paginationSchema, type Id } from './api/common';
export * from './api/intercom-access';
export * from './api/access-code';
export * from './api/access-log';
export * from './api/face-biometric';
