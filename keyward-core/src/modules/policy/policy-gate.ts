import { denied } from "../../lib/keyward-errors";
import type {
  AuthorizationRequest,
  Check,
  Policy,
  PolicyAllow,
  PolicyContext,
  PolicyDecision,
  PolicySet,
} from "./types";

type CheckOutcome = { passed: boolean } | { failedWith: unknown };

// A check that throws counts as a failure; the gate never lets an exception
// turn into an allow.
function runCheck<R>(check: Check<R>, ctx: PolicyContext<R>): CheckOutcome {
  try {
    return { passed: check.test(ctx) === true };
  } catch (error) {
    return { failedWith: error };
  }
}

export function policyAppliesTo<R>(policy: Policy<R>, action: string): boolean {
  return policy.actions === "*" || policy.actions.includes(action);
}

/**
 * Authorizes `actor` to perform `action` on `resource`.
 *
 * Bypasses run first and the first one that passes allows immediately. Then
 * every policy that applies to the action must pass; the first one that does
 * not decides the deny reason. With no passing bypass and no applicable
 * policy the answer is a denial.
 */
export function authorize<R>(
  set: PolicySet<R>,
  request: AuthorizationRequest<R>,
): PolicyDecision {
  const ctx: PolicyContext<R> = {
    actor: request.actor,
    action: request.action,
    resource: request.resource,
    interaction: request.interaction ?? "request",
  };

  for (const bypass of set.bypasses) {
    const outcome = runCheck(bypass.check, ctx);
    if ("passed" in outcome && outcome.passed) {
      return { kind: "allow", by: [bypass.name] };
    }
  }

  const applicable = set.policies.filter((policy) =>
    policyAppliesTo(policy, ctx.action),
  );
  if (applicable.length === 0) {
    return denied(`no policy authorizes ${set.resource}.${ctx.action}`);
  }

  for (const policy of applicable) {
    const outcome = runCheck(policy.check, ctx);
    if ("failedWith" in outcome) {
      return denied(`policy ${policy.name} could not be evaluated`);
    }
    if (!outcome.passed) {
      return denied(policy.reason);
    }
  }

  return { kind: "allow", by: applicable.map((policy) => policy.name) };
}

export const isAllowed = (decision: PolicyDecision): decision is PolicyAllow =>
  decision.kind === "allow";
