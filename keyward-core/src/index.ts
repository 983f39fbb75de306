export * from "./lib/logger";
export * from "./lib/keyward-errors";
export * from "./modules/policy/types";
export * from "./modules/policy/checks";
export { authorize, isAllowed, policyAppliesTo } from "./modules/policy/policy-gate";
export { RequestGate } from "./modules/policy/request-gate";
export type { RequestAuthState } from "./modules/policy/request-gate";
