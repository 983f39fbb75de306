import { authorize, isAllowed } from "./policy-gate";
import type { Actor, Interaction, PolicyDecision, PolicySet } from "./types";

export type RequestAuthState =
  | { state: "unauthenticated" }
  | { state: "authenticated"; actor: Actor }
  | { state: "authorized"; actor: Actor | null; action: string; by: string[] }
  | { state: "denied"; actor: Actor | null; action: string; reason: string };

/**
 * Per-request authorization state machine:
 *
 *   unauthenticated -> authenticated(actor) -> authorized | denied
 *
 * A request may also be authorized or denied straight from unauthenticated
 * (policies then see no actor). Authorized and denied are final.
 */
export class RequestGate {
  private current: RequestAuthState = { state: "unauthenticated" };

  get state(): RequestAuthState {
    return this.current;
  }

  get actor(): Actor | null {
    return this.current.state === "unauthenticated" ? null : this.current.actor;
  }

  authenticate(actor: Actor): void {
    if (this.current.state !== "unauthenticated") {
      throw new Error(
        `RequestGate: cannot authenticate from state '${this.current.state}'.`,
      );
    }
    this.current = { state: "authenticated", actor };
  }

  authorize<R>(
    set: PolicySet<R>,
    action: string,
    resource: R,
    interaction?: Interaction,
  ): PolicyDecision {
    if (
      this.current.state === "authorized" ||
      this.current.state === "denied"
    ) {
      throw new Error(
        `RequestGate: request was already ${this.current.state} for '${this.current.action}'.`,
      );
    }

    const actor = this.actor;
    const decision = authorize(set, { actor, action, resource, interaction });

    this.current =
      isAllowed(decision)
        ? { state: "authorized", actor, action, by: decision.by }
        : { state: "denied", actor, action, reason: decision.reason };

    return decision;
  }
}
