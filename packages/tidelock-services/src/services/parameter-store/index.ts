export { ParameterStore } from './parameter-store.js';
export type { ParameterStoreDependencies } from './parameter-store.js';
