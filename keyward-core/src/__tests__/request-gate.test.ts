import { actorIsResource, actorPresent } from "../modules/policy/checks";
import { RequestGate } from "../modules/policy/request-gate";
import type { PolicySet } from "../modules/policy/types";

const userPolicies: PolicySet<{ id: string }> = {
  resource: "user",
  bypasses: [],
  policies: [
    { name: "actor_present", actions: "*", check: actorPresent(), reason: "actor required" },
    { name: "self", actions: ["destroy"], check: actorIsResource(), reason: "not self" },
  ],
};

describe("RequestGate", () => {
  it("starts unauthenticated with no actor", () => {
    const gate = new RequestGate();

    expect(gate.state).toEqual({ state: "unauthenticated" });
    expect(gate.actor).toBeNull();
  });

  it("moves authenticated -> authorized when the policies pass", () => {
    const gate = new RequestGate();
    gate.authenticate({ id: "u1" });

    const decision = gate.authorize(userPolicies, "destroy", { id: "u1" });

    expect(decision.kind).toBe("allow");
    expect(gate.state).toEqual({
      state: "authorized",
      actor: { id: "u1" },
      action: "destroy",
      by: ["actor_present", "self"],
    });
  });

  it("moves authenticated -> denied with the failing reason", () => {
    const gate = new RequestGate();
    gate.authenticate({ id: "u1" });

    gate.authorize(userPolicies, "destroy", { id: "u2" });

    expect(gate.state).toEqual({
      state: "denied",
      actor: { id: "u1" },
      action: "destroy",
      reason: "not self",
    });
  });

  it("denies an unauthenticated request through the policies", () => {
    const gate = new RequestGate();

    gate.authorize(userPolicies, "destroy", { id: "u1" });

    expect(gate.state).toEqual({
      state: "denied",
      actor: null,
      action: "destroy",
      reason: "actor required",
    });
  });

  it("refuses to authenticate twice", () => {
    const gate = new RequestGate();
    gate.authenticate({ id: "u1" });

    expect(() => gate.authenticate({ id: "u2" })).toThrow(
      "RequestGate: cannot authenticate from state 'authenticated'.",
    );
  });

  it("treats authorized and denied as final", () => {
    const gate = new RequestGate();
    gate.authenticate({ id: "u1" });
    gate.authorize(userPolicies, "destroy", { id: "u2" });

    expect(() => gate.authorize(userPolicies, "destroy", { id: "u1" })).toThrow(
      "RequestGate: request was already denied for 'destroy'.",
    );
  });
});
