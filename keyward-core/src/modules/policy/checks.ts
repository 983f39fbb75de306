import type { Check, Interaction } from "./types";

export function actorPresent(): Check<unknown> {
  return { name: "actor_present", test: (ctx) => ctx.actor !== null };
}

export function interactionIs(interaction: Interaction): Check<unknown> {
  return {
    name: `interaction_is_${interaction}`,
    test: (ctx) => ctx.interaction === interaction,
  };
}

/** Ownership: the resource's `field` must hold the actor's id. */
export function actorOwns<K extends string>(
  field: K,
): Check<Record<K, unknown>> {
  return {
    name: `actor_owns_via_${field}`,
    test: (ctx) => ctx.actor !== null && ctx.resource[field] === ctx.actor.id,
  };
}

/** The resource is the actor itself (a user acting on their own record). */
export function actorIsResource(): Check<{ id: unknown }> {
  return {
    name: "actor_is_resource",
    test: (ctx) => ctx.actor !== null && ctx.resource.id === ctx.actor.id,
  };
}
