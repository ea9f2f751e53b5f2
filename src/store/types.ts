import type {
  Ingredient,
  IngredientAmount,
  MembershipKind,
  NewUser,
  PageWindow,
  Recipe,
  RecipeDraft,
  RecipeFilters,
  ShoppingListLine,
  Slice,
  Tag,
  User,
} from "../types";

export interface UserRepository {
  /** Throws `AlreadyExists` when the email or username is taken. */
  create(input: NewUser): Promise<User>;
  findById(id: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  list(window: PageWindow): Promise<Slice<User>>;
  update(id: string, patch: Partial<Pick<User, "avatar" | "passwordHash">>): Promise<User | null>;
}

export interface TagRepository {
  list(): Promise<Tag[]>;
  findById(id: string): Promise<Tag | null>;
  findByIds(ids: string[]): Promise<Tag[]>;
}

export interface IngredientRepository {
  /** Case-insensitive prefix match on the name; all ingredients without a prefix. */
  search(namePrefix?: string): Promise<Ingredient[]>;
  findById(id: string): Promise<Ingredient | null>;
  findByIds(ids: string[]): Promise<Ingredient[]>;
}

export interface RecipeRepository {
  /** Writes the recipe, its ingredient rows and tag links as one unit. */
  create(authorId: string, shortLink: string, draft: RecipeDraft): Promise<Recipe>;
  /** Replaces fields and the whole ingredient and tag sets as one unit. */
  update(id: string, draft: RecipeDraft): Promise<Recipe | null>;
  /** Removes the recipe together with its ingredient rows and memberships. */
  delete(id: string): Promise<boolean>;
  findById(id: string): Promise<Recipe | null>;
  findByShortLink(hash: string): Promise<Recipe | null>;
  shortLinkExists(hash: string): Promise<boolean>;
  list(filters: RecipeFilters, window: PageWindow): Promise<Slice<Recipe>>;
  listByAuthor(authorId: string, limit?: number): Promise<Recipe[]>;
  countByAuthor(authorId: string): Promise<number>;
  ingredientsOf(recipeId: string): Promise<IngredientAmount[]>;
}

/** Favorite and shopping-cart rows: one relation keyed by kind. */
export interface MembershipRepository {
  /** False when the pair already exists. */
  add(kind: MembershipKind, userId: string, recipeId: string): Promise<boolean>;
  /** False when there was nothing to remove. */
  remove(kind: MembershipKind, userId: string, recipeId: string): Promise<boolean>;
  exists(kind: MembershipKind, userId: string, recipeId: string): Promise<boolean>;
  shoppingList(userId: string): Promise<ShoppingListLine[]>;
}

export interface SubscriptionRepository {
  add(userId: string, authorId: string): Promise<boolean>;
  remove(userId: string, authorId: string): Promise<boolean>;
  exists(userId: string, authorId: string): Promise<boolean>;
  listAuthors(userId: string, window: PageWindow): Promise<Slice<User>>;
}

export interface Store {
  users: UserRepository;
  tags: TagRepository;
  ingredients: IngredientRepository;
  recipes: RecipeRepository;
  memberships: MembershipRepository;
  subscriptions: SubscriptionRepository;
}
