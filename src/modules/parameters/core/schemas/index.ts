export * from './card-parameters.js';
export * from './dashboard-parameters.js';
export { StringEnum } from './common.js';
