export { YieldPoolAccountant } from './yield-pool-accountant.js';
export type { YieldPoolAccountantDependencies } from './yield-pool-accountant.js';
export {
  AdditiveYieldIssuance,
  ShareRatioIssuance,
  createIssuancePolicy,
  dayWeightedYieldClaim,
} from './issuance-policies.js';
export type { IssuanceContext, IssuancePolicy } from './issuance-policies.js';
