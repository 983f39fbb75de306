import {
  actorIsResource,
  actorOwns,
  actorPresent,
  interactionIs,
  PolicySet,
} from "keyward-core";
import type { ApiKey } from "../../models/api-keys-model";
import type { User } from "../../models/users-model";

// The credential machinery reads these records while nobody is signed in yet.
const authenticationBypass = {
  name: "authentication_interaction",
  check: interactionIs("authentication"),
};

const actorRequired = {
  name: "actor_present",
  actions: "*",
  check: actorPresent(),
  reason: "actor required",
} as const;

/** Keys being created are checked before they exist, so `user_id` is all there is. */
export type ApiKeyResource = Pick<ApiKey, "user_id">;

export const apiKeyPolicies: PolicySet<ApiKeyResource> = {
  resource: "api_key",
  bypasses: [authenticationBypass],
  policies: [
    actorRequired,
    {
      name: "owner",
      actions: ["create", "read", "destroy"],
      check: actorOwns("user_id"),
      reason: "not owner",
    },
  ],
};

export const userPolicies: PolicySet<Pick<User, "id">> = {
  resource: "user",
  bypasses: [authenticationBypass],
  policies: [
    actorRequired,
    {
      name: "self",
      actions: ["read", "destroy"],
      check: actorIsResource(),
      reason: "not self",
    },
  ],
};
