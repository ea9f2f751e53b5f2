export type AuthUser = { id: string; email: string; username: string };

export interface User {
  id: string;
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
  avatar: string | null;
}

export type NewUser = Omit<User, "id" | "avatar">;

export interface Tag {
  id: string;
  name: string;
  slug: string;
}

export interface Ingredient {
  id: string;
  name: string;
  measurementUnit: string;
}

export interface Recipe {
  id: string;
  authorId: string;
  name: string;
  image: string;
  text: string;
  cookingTime: number;
  tagIds: string[];
  shortLink: string;
  createdAt: Date;
}

export type IngredientAmount = { ingredient: Ingredient; amount: number };

/** Validated recipe content with every reference resolved, ready to persist. */
export interface RecipeDraft {
  name: string;
  image: string;
  text: string;
  cookingTime: number;
  ingredients: IngredientAmount[];
  tags: Tag[];
}

/** Upper bound for amounts and cooking times; both are stored as 32-bit integers. */
export const MAX_POSITIVE_INT = 2147483647;

export const MEMBERSHIP_KINDS = ["favorite", "shopping_cart"] as const;
export type MembershipKind = (typeof MEMBERSHIP_KINDS)[number];

export interface ShoppingListLine {
  name: string;
  measurementUnit: string;
  totalAmount: number;
}

export type RecipeFilters = {
  authorId?: string;
  tagSlugs?: string[];
  favorited?: { userId: string; include: boolean };
  inShoppingCart?: { userId: string; include: boolean };
};

export type PageWindow = { offset: number; limit: number };
export type Slice<T> = { items: T[]; total: number };
