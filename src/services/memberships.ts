import { AppError } from "../lib/errors";
import { ensureAllowed } from "../lib/policy";
import { toShortRecipe, type AuthorView, type ShortRecipeView } from "../lib/presenters";
import type { AuthUser, MembershipKind, PageWindow, Slice } from "../types";
import { findRecipe, type ServiceContext } from "./recipes";
import { describeAuthor, findUser } from "./users";

/** A (user, target) pair that can be added once and removed once. */
interface Membership {
  exists(): Promise<boolean>;
  add(): Promise<boolean>;
  remove(): Promise<boolean>;
}

// Add on an existing pair and remove on a missing one are errors, not no-ops.
// The unique index still decides a race: a losing insert reports false.
const addMember = async (membership: Membership, duplicateMessage: string) => {
  if ((await membership.exists()) || !(await membership.add())) {
    throw new AppError("AlreadyExists", duplicateMessage);
  }
};

const removeMember = async (membership: Membership, absentMessage: string) => {
  if (!(await membership.remove())) throw new AppError("NotFound", absentMessage);
};

const MESSAGES: Record<MembershipKind, { duplicate: string; absent: string }> = {
  favorite: {
    duplicate: "This recipe is already in your favorites.",
    absent: "This recipe is not in your favorites.",
  },
  shopping_cart: {
    duplicate: "This recipe is already in your shopping cart.",
    absent: "This recipe is not in your shopping cart.",
  },
};

const recipeMembership = (ctx: ServiceContext, kind: MembershipKind, userId: string, recipeId: string): Membership => ({
  exists: () => ctx.store.memberships.exists(kind, userId, recipeId),
  add: () => ctx.store.memberships.add(kind, userId, recipeId),
  remove: () => ctx.store.memberships.remove(kind, userId, recipeId),
});

const subscription = (ctx: ServiceContext, userId: string, authorId: string): Membership => ({
  exists: () => ctx.store.subscriptions.exists(userId, authorId),
  add: () => ctx.store.subscriptions.add(userId, authorId),
  remove: () => ctx.store.subscriptions.remove(userId, authorId),
});

export const addToCollection = async (
  ctx: ServiceContext,
  actor: AuthUser | null,
  kind: MembershipKind,
  recipeId: string
): Promise<ShortRecipeView> => {
  ensureAllowed("membership.add", actor);
  const recipe = await findRecipe(ctx.store, recipeId);
  await addMember(recipeMembership(ctx, kind, actor.id, recipe.id), MESSAGES[kind].duplicate);
  return toShortRecipe(recipe);
};

export const removeFromCollection = async (
  ctx: ServiceContext,
  actor: AuthUser | null,
  kind: MembershipKind,
  recipeId: string
): Promise<void> => {
  ensureAllowed("membership.remove", actor);
  const recipe = await findRecipe(ctx.store, recipeId);
  await removeMember(recipeMembership(ctx, kind, actor.id, recipe.id), MESSAGES[kind].absent);
};

export const subscribe = async (
  ctx: ServiceContext,
  actor: AuthUser | null,
  authorId: string,
  recipesLimit?: number
): Promise<AuthorView> => {
  ensureAllowed("subscription.add", actor);
  const author = await findUser(ctx.store, authorId);
  if (author.id === actor.id) {
    throw new AppError("SelfReferenceForbidden", "You cannot subscribe to yourself.");
  }
  await addMember(subscription(ctx, actor.id, author.id), "You are already subscribed to this user.");
  console.log(`✅ [SUBSCRIPTIONS] ${actor.username} subscribed to ${author.username}`);
  return describeAuthor(ctx, author, actor, recipesLimit);
};

export const unsubscribe = async (ctx: ServiceContext, actor: AuthUser | null, authorId: string): Promise<void> => {
  ensureAllowed("subscription.remove", actor);
  const author = await findUser(ctx.store, authorId);
  await removeMember(subscription(ctx, actor.id, author.id), "You are not subscribed to this user.");
};

export const listSubscriptions = async (
  ctx: ServiceContext,
  actor: AuthUser | null,
  window: PageWindow,
  recipesLimit?: number
): Promise<Slice<AuthorView>> => {
  ensureAllowed("subscription.list", actor);
  const page = await ctx.store.subscriptions.listAuthors(actor.id, window);
  const items = await Promise.all(page.items.map((author) => describeAuthor(ctx, author, actor, recipesLimit)));
  return { items, total: page.total };
};
