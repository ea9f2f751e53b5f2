import { z } from "zod";
import { AppError, parseWith } from "../lib/errors";
import type { ImageStore } from "../lib/images";
import { ensureAllowed } from "../lib/policy";
import { toRecipeView, toUserView, type RecipeView } from "../lib/presenters";
import { generateShortLink, shortLinkUrl } from "../lib/shortLink";
import type { Store } from "../store/types";
import {
  MAX_POSITIVE_INT,
  type AuthUser,
  type PageWindow,
  type Recipe,
  type RecipeDraft,
  type RecipeFilters,
  type Slice,
} from "../types";

export type ServiceContext = {
  store: Store;
  images: ImageStore;
  /** Replaces the random short-link draw. */
  nextShortLink?: () => string;
};

const idSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

export const recipeInputSchema = z.object({
  name: z.string().trim().min(1).max(256),
  text: z.string().trim().min(1),
  image: z.string().min(1).nullish(),
  cooking_time: z.number(),
  ingredients: z.array(z.object({ id: idSchema, amount: z.number() })).nullish(),
  tags: z.array(idSchema).nullish(),
});

export type RecipeInput = z.infer<typeof recipeInputSchema>;

export type CompositionRefs = {
  ingredients: { id: string; amount: number }[];
  tagIds: string[];
};

const isPositiveInt = (value: number) => Number.isInteger(value) && value >= 1 && value <= MAX_POSITIVE_INT;

const firstDuplicate = (ids: string[]) => ids.find((id, i) => ids.indexOf(id) !== i);

/**
 * Checks everything that does not need the database. `image` is only
 * mandatory on create; an update keeps the stored image when it is left out.
 */
export const validateRecipeComposition = (input: RecipeInput, mode: "create" | "update"): CompositionRefs => {
  if (mode === "create" && !input.image) {
    throw new AppError("MissingField", "image: this field is required.", "image");
  }
  if (!isPositiveInt(input.cooking_time)) {
    throw new AppError("InvalidField", `cooking_time: must be a whole number between 1 and ${MAX_POSITIVE_INT}.`, "cooking_time");
  }

  const ingredients = input.ingredients ?? [];
  if (ingredients.length === 0) {
    throw new AppError("MissingField", "ingredients: at least one ingredient is required.", "ingredients");
  }
  const duplicateIngredient = firstDuplicate(ingredients.map((i) => i.id));
  if (duplicateIngredient !== undefined) {
    throw new AppError("DuplicateReference", `ingredients: ingredient ${duplicateIngredient} is listed twice.`, "ingredients");
  }
  const badAmount = ingredients.find((i) => !isPositiveInt(i.amount));
  if (badAmount) {
    throw new AppError("InvalidField", `ingredients: amount for ingredient ${badAmount.id} must be a whole number between 1 and ${MAX_POSITIVE_INT}.`, "ingredients");
  }

  const tagIds = input.tags ?? [];
  if (tagIds.length === 0) {
    throw new AppError("MissingField", "tags: at least one tag is required.", "tags");
  }
  const duplicateTag = firstDuplicate(tagIds);
  if (duplicateTag !== undefined) {
    throw new AppError("DuplicateReference", `tags: tag ${duplicateTag} is listed twice.`, "tags");
  }

  return { ingredients: ingredients.map(({ id, amount }) => ({ id, amount })), tagIds };
};

/** Resolves ids to stored ingredients and tags, keeping the submitted order. */
export const resolveRecipeComposition = async (store: Store, refs: CompositionRefs) => {
  const [ingredients, tags] = await Promise.all([
    store.ingredients.findByIds(refs.ingredients.map((i) => i.id)),
    store.tags.findByIds(refs.tagIds),
  ]);
  const ingredientsById = new Map(ingredients.map((i) => [i.id, i]));
  const tagsById = new Map(tags.map((t) => [t.id, t]));

  const resolvedIngredients = refs.ingredients.map(({ id, amount }) => {
    const ingredient = ingredientsById.get(id);
    if (!ingredient) throw new AppError("UnknownReference", `ingredients: ingredient ${id} does not exist.`, "ingredients");
    return { ingredient, amount };
  });
  const resolvedTags = refs.tagIds.map((id) => {
    const tag = tagsById.get(id);
    if (!tag) throw new AppError("UnknownReference", `tags: tag ${id} does not exist.`, "tags");
    return tag;
  });
  return { ingredients: resolvedIngredients, tags: resolvedTags };
};

export const describeRecipe = async (ctx: ServiceContext, recipe: Recipe, viewer: AuthUser | null): Promise<RecipeView> => {
  const { store } = ctx;
  const [author, ingredients, tags, isSubscribed, isFavorited, isInShoppingCart] = await Promise.all([
    store.users.findById(recipe.authorId),
    store.recipes.ingredientsOf(recipe.id),
    store.tags.findByIds(recipe.tagIds),
    viewer ? store.subscriptions.exists(viewer.id, recipe.authorId) : false,
    viewer ? store.memberships.exists("favorite", viewer.id, recipe.id) : false,
    viewer ? store.memberships.exists("shopping_cart", viewer.id, recipe.id) : false,
  ]);
  if (!author) throw new AppError("NotFound", "Recipe author not found.");
  return toRecipeView({
    recipe,
    author: toUserView(author, isSubscribed),
    ingredients,
    tags,
    isFavorited,
    isInShoppingCart,
  });
};

export const findRecipe = async (store: Store, id: string): Promise<Recipe> => {
  const recipe = await store.recipes.findById(id);
  if (!recipe) throw new AppError("NotFound", "Recipe not found.");
  return recipe;
};

export const getRecipe = async (ctx: ServiceContext, viewer: AuthUser | null, id: string) => {
  ensureAllowed("recipe.read", viewer);
  return describeRecipe(ctx, await findRecipe(ctx.store, id), viewer);
};

export const listRecipes = async (
  ctx: ServiceContext,
  viewer: AuthUser | null,
  filters: RecipeFilters,
  window: PageWindow
): Promise<Slice<RecipeView>> => {
  ensureAllowed("recipe.read", viewer);
  const page = await ctx.store.recipes.list(filters, window);
  const items = await Promise.all(page.items.map((recipe) => describeRecipe(ctx, recipe, viewer)));
  return { items, total: page.total };
};

export const createRecipe = async (ctx: ServiceContext, actor: AuthUser | null, body: unknown) => {
  ensureAllowed("recipe.create", actor);
  const input = parseWith(recipeInputSchema, body);
  const refs = validateRecipeComposition(input, "create");
  const resolved = await resolveRecipeComposition(ctx.store, refs);
  const shortLink = await generateShortLink((hash) => ctx.store.recipes.shortLinkExists(hash), ctx.nextShortLink);

  const image = await ctx.images.save(input.image ?? "", "recipes");
  const draft: RecipeDraft = { name: input.name, text: input.text, cookingTime: input.cooking_time, image, ...resolved };
  let recipe: Recipe;
  try {
    recipe = await ctx.store.recipes.create(actor.id, shortLink, draft);
  } catch (e) {
    await ctx.images.remove(image);
    throw e;
  }
  console.log(`✅ [RECIPES] ${actor.username} created recipe ${recipe.id}`);
  return describeRecipe(ctx, recipe, actor);
};

export const updateRecipe = async (ctx: ServiceContext, actor: AuthUser | null, id: string, body: unknown) => {
  const current = await findRecipe(ctx.store, id);
  ensureAllowed("recipe.update", actor, current);
  const input = parseWith(recipeInputSchema, body);
  const refs = validateRecipeComposition(input, "update");
  const resolved = await resolveRecipeComposition(ctx.store, refs);

  const replacesImage = !!input.image && input.image !== current.image;
  const image = replacesImage && input.image ? await ctx.images.save(input.image, "recipes") : current.image;
  const draft: RecipeDraft = { name: input.name, text: input.text, cookingTime: input.cooking_time, image, ...resolved };
  let recipe: Recipe | null;
  try {
    recipe = await ctx.store.recipes.update(id, draft);
  } catch (e) {
    if (replacesImage) await ctx.images.remove(image);
    throw e;
  }
  if (!recipe) throw new AppError("NotFound", "Recipe not found.");
  if (replacesImage) await ctx.images.remove(current.image);
  return describeRecipe(ctx, recipe, actor);
};

export const deleteRecipe = async (ctx: ServiceContext, actor: AuthUser | null, id: string) => {
  const current = await findRecipe(ctx.store, id);
  ensureAllowed("recipe.delete", actor, current);
  if (!(await ctx.store.recipes.delete(id))) throw new AppError("NotFound", "Recipe not found.");
  await ctx.images.remove(current.image);
};

export const getShortLink = async (ctx: ServiceContext, id: string, baseUrl: string) => {
  const recipe = await findRecipe(ctx.store, id);
  return { "short-link": shortLinkUrl(baseUrl, recipe.shortLink) };
};

export const resolveShortLink = async (ctx: ServiceContext, hash: string) => {
  const recipe = await ctx.store.recipes.findByShortLink(hash);
  if (!recipe) throw new AppError("NotFound", "Short link not found.");
  return recipe.id;
};
