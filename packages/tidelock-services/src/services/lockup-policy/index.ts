export { LockupPolicy } from './lockup-policy.js';
export type { LockupPolicyDependencies, LockExtension } from './lockup-policy.js';
