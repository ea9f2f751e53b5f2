import type { AuthUser } from "../types";
import { AppError } from "./errors";

export type Operation =
  | "recipe.read"
  | "recipe.create"
  | "recipe.update"
  | "recipe.delete"
  | "membership.add"
  | "membership.remove"
  | "subscription.add"
  | "subscription.remove"
  | "subscription.list"
  | "shoppingList.download"
  | "profile.read"
  | "profile.update";

export type Decision = "allow" | "unauthenticated" | "forbidden";

const AUTHOR_ONLY: ReadonlySet<Operation> = new Set(["recipe.update", "recipe.delete"]);

export const authorize = (
  operation: Operation,
  actor: AuthUser | null,
  target?: { authorId: string }
): Decision => {
  if (operation === "recipe.read") return "allow";
  if (!actor) return "unauthenticated";
  if (AUTHOR_ONLY.has(operation)) {
    return target && target.authorId === actor.id ? "allow" : "forbidden";
  }
  return "allow";
};

/** Narrows `actor` to a signed-in user or throws the matching AppError. */
export function ensureAllowed(
  operation: Operation,
  actor: AuthUser | null,
  target?: { authorId: string }
): asserts actor is AuthUser {
  const decision = authorize(operation, actor, target);
  if (decision === "unauthenticated") {
    throw new AppError("Unauthenticated", "Authentication credentials were not provided.");
  }
  if (decision === "forbidden") {
    throw new AppError("Forbidden", "You do not have permission to perform this action.");
  }
}
