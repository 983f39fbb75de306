import type { KeywardDeniedError } from "../../lib/keyward-errors";

/** The authenticated identity attempting an action. */
export interface Actor {
  id: string;
}

/**
 * Who is driving the action. `authentication` is the credential machinery
 * itself looking records up (e.g. an API key lookup during sign-in), which
 * bypass policies may authorize unconditionally.
 */
export type Interaction = "request" | "authentication";

export interface PolicyContext<R> {
  actor: Actor | null;
  action: string;
  resource: R;
  interaction: Interaction;
}

export interface Check<R> {
  /** Shown in logs and in deny reasons when the check throws */
  name: string;
  test: (ctx: PolicyContext<R>) => boolean;
}

export interface Bypass<R> {
  name: string;
  check: Check<R>;
}

export interface Policy<R> {
  name: string;
  /** Actions the policy applies to; "*" for every action */
  actions: "*" | readonly string[];
  check: Check<R>;
  /** Deny reason reported when the check fails */
  reason: string;
}

export interface PolicySet<R> {
  resource: string;
  bypasses: readonly Bypass<R>[];
  policies: readonly Policy<R>[];
}

export interface AuthorizationRequest<R> {
  actor: Actor | null;
  action: string;
  resource: R;
  interaction?: Interaction;
}

export type PolicyAllow = {
  kind: "allow";
  /** Name of the bypass, or names of every policy that passed */
  by: string[];
};

export type PolicyDecision = PolicyAllow | KeywardDeniedError;
