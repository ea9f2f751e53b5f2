import type { IngredientAmount, Ingredient, Recipe, Tag, User } from "../types";

export type UserView = {
  id: string;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  is_subscribed: boolean;
  avatar: string | null;
};

export type ShortRecipeView = { id: string; name: string; image: string; cooking_time: number };

export type AuthorView = UserView & { recipes: ShortRecipeView[]; recipes_count: number };

export type RecipeView = {
  id: string;
  author: UserView;
  name: string;
  image: string;
  ingredients: { id: string; name: string; measurement_unit: string; amount: number }[];
  tags: TagView[];
  cooking_time: number;
  is_favorited: boolean;
  is_in_shopping_cart: boolean;
  text: string;
};

export type TagView = { id: string; name: string; slug: string };
export type IngredientView = { id: string; name: string; measurement_unit: string };

export const toUserView = (user: User, isSubscribed: boolean): UserView => ({
  id: user.id,
  email: user.email,
  username: user.username,
  first_name: user.firstName,
  last_name: user.lastName,
  is_subscribed: isSubscribed,
  avatar: user.avatar,
});

export const toShortRecipe = (recipe: Recipe): ShortRecipeView => ({
  id: recipe.id,
  name: recipe.name,
  image: recipe.image,
  cooking_time: recipe.cookingTime,
});

export const toTagView = (tag: Tag): TagView => ({ id: tag.id, name: tag.name, slug: tag.slug });

export const toIngredientView = (ingredient: Ingredient): IngredientView => ({
  id: ingredient.id,
  name: ingredient.name,
  measurement_unit: ingredient.measurementUnit,
});

export const toRecipeView = (input: {
  recipe: Recipe;
  author: UserView;
  ingredients: IngredientAmount[];
  tags: Tag[];
  isFavorited: boolean;
  isInShoppingCart: boolean;
}): RecipeView => ({
  id: input.recipe.id,
  author: input.author,
  name: input.recipe.name,
  image: input.recipe.image,
  ingredients: input.ingredients.map(({ ingredient, amount }) => ({ ...toIngredientView(ingredient), amount })),
  tags: input.tags.map(toTagView),
  cooking_time: input.recipe.cookingTime,
  is_favorited: input.isFavorited,
  is_in_shopping_cart: input.isInShoppingCart,
  text: input.recipe.text,
});
