import { AppError } from "../../src/lib/errors";
import { createMemoryStore, MemoryImageStore } from "../../src/store/memory";
import type { ServiceContext } from "../../src/services/recipes";
import { toAuthUser } from "../../src/services/users";

// 1x1 transparent png
export const PNG =
  "data:image/png;base64,iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=";

export const seededStore = () =>
  createMemoryStore({
    tags: [
      { name: "Breakfast", slug: "breakfast" },
      { name: "Dinner", slug: "dinner" },
    ],
    ingredients: [
      { name: "eggs", measurementUnit: "pcs" },
      { name: "flour", measurementUnit: "g" },
      { name: "sugar", measurementUnit: "g" },
    ],
  });

export const setup = async (options: Pick<ServiceContext, "nextShortLink"> = {}) => {
  const store = seededStore();
  const images = new MemoryImageStore();
  const ctx: ServiceContext = { store, images, ...options };
  const [eggs, flour, sugar] = await store.ingredients.search();
  const [breakfast, dinner] = await store.tags.list();
  const alice = toAuthUser(
    await store.users.create({
      email: "alice@example.com",
      username: "alice",
      firstName: "Alice",
      lastName: "Baker",
      passwordHash: "unused",
    })
  );
  const bob = toAuthUser(
    await store.users.create({
      email: "bob@example.com",
      username: "bob",
      firstName: "Bob",
      lastName: "Grill",
      passwordHash: "unused",
    })
  );
  return { store, images, ctx, ids: { eggs: eggs.id, flour: flour.id, sugar: sugar.id, breakfast: breakfast.id, dinner: dinner.id }, alice, bob };
};

export type Fixture = Awaited<ReturnType<typeof setup>>;

export const recipeBody = (f: Fixture, overrides: Record<string, unknown> = {}) => ({
  name: "Pancakes",
  text: "Whisk everything and fry.",
  image: PNG,
  cooking_time: 15,
  ingredients: [
    { id: f.ids.eggs, amount: 2 },
    { id: f.ids.flour, amount: 100 },
  ],
  tags: [f.ids.breakfast],
  ...overrides,
});

/** Resolves to the AppError kind a promise rejects with, or "resolved". */
export const errorKind = async (promise: Promise<unknown>): Promise<string> => {
  try {
    await promise;
  } catch (e) {
    if (e instanceof AppError) return e.kind;
    throw e;
  }
  return "resolved";
};
