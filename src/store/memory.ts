import { AppError } from "../lib/errors";
import type { ImageStore } from "../lib/images";
import { parseDataUri } from "../lib/images";
import { sumIngredientLines } from "../lib/shoppingList";
import { MEMBERSHIP_KINDS } from "../types";
import type {
  Ingredient,
  MembershipKind,
  PageWindow,
  Recipe,
  RecipeDraft,
  RecipeFilters,
  Slice,
  Tag,
  User,
} from "../types";
import type { Store } from "./types";

type StoredRecipe = Recipe & { seq: number };
type RecipeLine = { ingredientId: string; amount: number };

const slice = <T>(items: T[], { offset, limit }: PageWindow): Slice<T> => ({
  items: items.slice(offset, offset + limit),
  total: items.length,
});

const byUsername = (a: User, b: User) => (a.username < b.username ? -1 : a.username > b.username ? 1 : 0);

const newestFirst = (a: StoredRecipe, b: StoredRecipe) =>
  b.createdAt.getTime() - a.createdAt.getTime() || b.seq - a.seq;

const pairKey = (a: string, b: string) => `${a}:${b}`;

const publicRecipe = ({ seq: _seq, ...recipe }: StoredRecipe): Recipe => ({ ...recipe, tagIds: [...recipe.tagIds] });

export type MemoryStoreSeed = {
  tags?: Omit<Tag, "id">[];
  ingredients?: Omit<Ingredient, "id">[];
};

export type MemoryStore = Store & {
  /** Row counts, for asserting cascades and replacements. */
  counts(): { recipeIngredients: number; favorites: number; shoppingCart: number; subscriptions: number };
};

/**
 * Process-local store with the same uniqueness rules as the mongoose one.
 * Each write completes synchronously, so no reader sees half of it.
 */
export const createMemoryStore = (seed: MemoryStoreSeed = {}): MemoryStore => {
  let nextId = 0;
  const newId = () => String(++nextId);

  const users = new Map<string, User>();
  const tags = new Map<string, Tag>();
  const ingredients = new Map<string, Ingredient>();
  const recipes = new Map<string, StoredRecipe>();
  const recipeLines = new Map<string, RecipeLine[]>();
  const memberships: Record<MembershipKind, Set<string>> = {
    favorite: new Set(),
    shopping_cart: new Set(),
  };
  const subscriptions = new Set<string>();

  for (const tag of seed.tags ?? []) {
    const id = newId();
    tags.set(id, { id, ...tag });
  }
  for (const ingredient of seed.ingredients ?? []) {
    const id = newId();
    ingredients.set(id, { id, ...ingredient });
  }

  const writeRecipe = (recipe: StoredRecipe, draft: RecipeDraft) => {
    recipes.set(recipe.id, recipe);
    recipeLines.set(
      recipe.id,
      draft.ingredients.map(({ ingredient, amount }) => ({ ingredientId: ingredient.id, amount }))
    );
  };

  const recipeIdsOf = (kind: MembershipKind, userId: string) => {
    const ids = new Set<string>();
    for (const key of memberships[kind]) {
      const [user, recipe] = key.split(":");
      if (user === userId) ids.add(recipe);
    }
    return ids;
  };

  const matches = (recipe: StoredRecipe, filters: RecipeFilters) => {
    if (filters.authorId !== undefined && recipe.authorId !== filters.authorId) return false;
    if (filters.tagSlugs && filters.tagSlugs.length > 0) {
      const slugs = new Set(filters.tagSlugs);
      if (!recipe.tagIds.some((id) => slugs.has(tags.get(id)?.slug ?? ""))) return false;
    }
    for (const [kind, flag] of [
      ["favorite", filters.favorited],
      ["shopping_cart", filters.inShoppingCart],
    ] as const) {
      if (flag && memberships[kind].has(pairKey(flag.userId, recipe.id)) !== flag.include) return false;
    }
    return true;
  };

  return {
    counts: () => ({
      recipeIngredients: [...recipeLines.values()].reduce((n, lines) => n + lines.length, 0),
      favorites: memberships.favorite.size,
      shoppingCart: memberships.shopping_cart.size,
      subscriptions: subscriptions.size,
    }),

    users: {
      create: async (input) => {
        const email = input.email.toLowerCase();
        for (const user of users.values()) {
          if (user.email === email || user.username === input.username) {
            throw new AppError("AlreadyExists", "A user with that email or username already exists.");
          }
        }
        const user: User = { ...input, email, id: newId(), avatar: null };
        users.set(user.id, user);
        return { ...user };
      },
      findById: async (id) => {
        const user = users.get(id);
        return user ? { ...user } : null;
      },
      findByEmail: async (email) => {
        const wanted = email.toLowerCase();
        const user = [...users.values()].find((u) => u.email === wanted);
        return user ? { ...user } : null;
      },
      findByUsername: async (username) => {
        const user = [...users.values()].find((u) => u.username === username);
        return user ? { ...user } : null;
      },
      list: async (window) => slice([...users.values()].sort(byUsername), window),
      update: async (id, patch) => {
        const user = users.get(id);
        if (!user) return null;
        const updated = { ...user, ...patch };
        users.set(id, updated);
        return { ...updated };
      },
    },

    tags: {
      list: async () => [...tags.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)),
      findById: async (id) => tags.get(id) ?? null,
      findByIds: async (ids) => ids.flatMap((id) => tags.get(id) ?? []),
    },

    ingredients: {
      search: async (namePrefix) => {
        const prefix = namePrefix?.toLowerCase();
        return [...ingredients.values()]
          .filter((i) => !prefix || i.name.toLowerCase().startsWith(prefix))
          .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
      },
      findById: async (id) => ingredients.get(id) ?? null,
      findByIds: async (ids) => ids.flatMap((id) => ingredients.get(id) ?? []),
    },

    recipes: {
      create: async (authorId, shortLink, draft) => {
        if ([...recipes.values()].some((r) => r.shortLink === shortLink)) {
          throw new Error(`Duplicate short link ${shortLink}`);
        }
        const id = newId();
        const recipe: StoredRecipe = {
          id,
          seq: nextId,
          authorId,
          name: draft.name,
          image: draft.image,
          text: draft.text,
          cookingTime: draft.cookingTime,
          tagIds: draft.tags.map((t) => t.id),
          shortLink,
          createdAt: new Date(),
        };
        writeRecipe(recipe, draft);
        return publicRecipe(recipe);
      },
      update: async (id, draft) => {
        const current = recipes.get(id);
        if (!current) return null;
        const recipe: StoredRecipe = {
          ...current,
          name: draft.name,
          image: draft.image,
          text: draft.text,
          cookingTime: draft.cookingTime,
          tagIds: draft.tags.map((t) => t.id),
        };
        writeRecipe(recipe, draft);
        return publicRecipe(recipe);
      },
      delete: async (id) => {
        if (!recipes.delete(id)) return false;
        recipeLines.delete(id);
        for (const kind of MEMBERSHIP_KINDS) {
          for (const key of memberships[kind]) {
            if (key.endsWith(`:${id}`)) memberships[kind].delete(key);
          }
        }
        return true;
      },
      findById: async (id) => {
        const recipe = recipes.get(id);
        return recipe ? publicRecipe(recipe) : null;
      },
      findByShortLink: async (hash) => {
        const recipe = [...recipes.values()].find((r) => r.shortLink === hash);
        return recipe ? publicRecipe(recipe) : null;
      },
      shortLinkExists: async (hash) => [...recipes.values()].some((r) => r.shortLink === hash),
      list: async (filters, window) =>
        slice(
          [...recipes.values()]
            .filter((r) => matches(r, filters))
            .sort(newestFirst)
            .map(publicRecipe),
          window
        ),
      listByAuthor: async (authorId, limit) => {
        const own = [...recipes.values()].filter((r) => r.authorId === authorId).sort(newestFirst);
        return (limit === undefined ? own : own.slice(0, limit)).map(publicRecipe);
      },
      countByAuthor: async (authorId) => [...recipes.values()].filter((r) => r.authorId === authorId).length,
      ingredientsOf: async (recipeId) =>
        (recipeLines.get(recipeId) ?? []).flatMap(({ ingredientId, amount }) => {
          const ingredient = ingredients.get(ingredientId);
          return ingredient ? [{ ingredient, amount }] : [];
        }),
    },

    memberships: {
      add: async (kind, userId, recipeId) => {
        const key = pairKey(userId, recipeId);
        if (memberships[kind].has(key)) return false;
        memberships[kind].add(key);
        return true;
      },
      remove: async (kind, userId, recipeId) => memberships[kind].delete(pairKey(userId, recipeId)),
      exists: async (kind, userId, recipeId) => memberships[kind].has(pairKey(userId, recipeId)),
      shoppingList: async (userId) => {
        const rows = [...recipeIdsOf("shopping_cart", userId)].flatMap((recipeId) =>
          (recipeLines.get(recipeId) ?? []).flatMap(({ ingredientId, amount }) => {
            const ingredient = ingredients.get(ingredientId);
            return ingredient ? [{ name: ingredient.name, measurementUnit: ingredient.measurementUnit, amount }] : [];
          })
        );
        return sumIngredientLines(rows);
      },
    },

    subscriptions: {
      add: async (userId, authorId) => {
        if (userId === authorId) throw new Error("A user cannot subscribe to themselves");
        const key = pairKey(userId, authorId);
        if (subscriptions.has(key)) return false;
        subscriptions.add(key);
        return true;
      },
      remove: async (userId, authorId) => subscriptions.delete(pairKey(userId, authorId)),
      exists: async (userId, authorId) => subscriptions.has(pairKey(userId, authorId)),
      listAuthors: async (userId, window) => {
        const authors: User[] = [];
        for (const key of subscriptions) {
          const [user, author] = key.split(":");
          const found = user === userId ? users.get(author) : undefined;
          if (found) authors.push({ ...found });
        }
        return slice(authors.sort(byUsername), window);
      },
    },
  };
};

/** Keeps decoded images in a map; URLs look like the disk store's. */
export class MemoryImageStore implements ImageStore {
  readonly files = new Map<string, Buffer>();
  private counter = 0;

  async save(dataUri: string, folder: string): Promise<string> {
    const { extension, bytes } = parseDataUri(dataUri);
    const url = `/media/${folder}/image-${++this.counter}.${extension}`;
    this.files.set(url, bytes);
    return url;
  }

  async remove(url: string): Promise<void> {
    this.files.delete(url);
  }
}
