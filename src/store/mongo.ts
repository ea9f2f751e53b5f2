import mongoose, { isValidObjectId, type FilterQuery, type HydratedDocument } from "mongoose";
import {
  Favorite,
  Ingredient,
  Recipe,
  RecipeIngredient,
  ShoppingCart,
  Subscription,
  Tag,
  User,
  relationModels,
  type IngredientRecord,
  type RecipeRecord,
  type TagRecord,
  type UserRecord,
} from "../models";
import { AppError } from "../lib/errors";
import type * as domain from "../types";
import type { Store } from "./types";

const validIds = (ids: string[]) => ids.filter((id) => isValidObjectId(id));

/** Returns `items` in the order of `ids`, the way the memory store answers. */
export const orderByIds = <T extends { id: string }>(ids: string[], items: T[]): T[] => {
  const byId = new Map(items.map((item) => [item.id, item]));
  return ids.flatMap((id) => byId.get(id) ?? []);
};

const escapeRegex = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const isDuplicateKey = (e: unknown) =>
  typeof e === "object" && e !== null && "code" in e && e.code === 11000;

const toUser = (doc: HydratedDocument<UserRecord>): domain.User => ({
  id: String(doc._id),
  email: doc.email,
  username: doc.username,
  firstName: doc.firstName,
  lastName: doc.lastName,
  passwordHash: doc.passwordHash,
  avatar: doc.avatar ?? null,
});

const toTag = (doc: HydratedDocument<TagRecord>): domain.Tag => ({
  id: String(doc._id),
  name: doc.name,
  slug: doc.slug,
});

const toIngredient = (doc: HydratedDocument<IngredientRecord>): domain.Ingredient => ({
  id: String(doc._id),
  name: doc.name,
  measurementUnit: doc.measurementUnit,
});

const toRecipe = (doc: HydratedDocument<RecipeRecord>): domain.Recipe => ({
  id: String(doc._id),
  authorId: String(doc.author),
  name: doc.name,
  image: doc.image,
  text: doc.text,
  cookingTime: doc.cookingTime,
  tagIds: doc.tags.map(String),
  shortLink: doc.shortLink,
  createdAt: doc.createdAt,
});

const ingredientRows = (recipeId: mongoose.Types.ObjectId, draft: domain.RecipeDraft) =>
  draft.ingredients.map(({ ingredient, amount }) => ({
    recipe: recipeId,
    ingredient: ingredient.id,
    amount,
  }));

const recipeFilter = async (filters: domain.RecipeFilters): Promise<FilterQuery<RecipeRecord> | null> => {
  const and: FilterQuery<RecipeRecord>[] = [];
  if (filters.authorId !== undefined) {
    if (!isValidObjectId(filters.authorId)) return null;
    and.push({ author: filters.authorId });
  }
  if (filters.tagSlugs && filters.tagSlugs.length > 0) {
    const tags = await Tag.find({ slug: { $in: filters.tagSlugs } }, { _id: 1 });
    and.push({ tags: { $in: tags.map((t) => t._id) } });
  }
  for (const [kind, flag] of [
    ["favorite", filters.favorited],
    ["shopping_cart", filters.inShoppingCart],
  ] as const) {
    if (!flag) continue;
    const ids = await relationModels[kind].distinct("recipe", { user: flag.userId });
    and.push({ _id: flag.include ? { $in: ids } : { $nin: ids } });
  }
  return and.length > 0 ? { $and: and } : {};
};

/**
 * Multi-document writes run inside a transaction, so the server must be a
 * replica set.
 */
export const createMongoStore = (): Store => ({
  users: {
    create: async (input) => {
      try {
        return toUser(await User.create({ ...input, avatar: null }));
      } catch (e) {
        if (isDuplicateKey(e)) {
          throw new AppError("AlreadyExists", "A user with that email or username already exists.");
        }
        throw e;
      }
    },
    findById: async (id) => {
      if (!isValidObjectId(id)) return null;
      const doc = await User.findById(id);
      return doc ? toUser(doc) : null;
    },
    findByEmail: async (email) => {
      const doc = await User.findOne({ email: email.toLowerCase() });
      return doc ? toUser(doc) : null;
    },
    findByUsername: async (username) => {
      const doc = await User.findOne({ username });
      return doc ? toUser(doc) : null;
    },
    list: async ({ offset, limit }) => {
      const [docs, total] = await Promise.all([
        User.find().sort({ username: 1 }).skip(offset).limit(limit),
        User.countDocuments(),
      ]);
      return { items: docs.map(toUser), total };
    },
    update: async (id, patch) => {
      if (!isValidObjectId(id)) return null;
      const doc = await User.findByIdAndUpdate(id, { $set: patch }, { new: true });
      return doc ? toUser(doc) : null;
    },
  },

  tags: {
    list: async () => (await Tag.find().sort({ name: 1 })).map(toTag),
    findById: async (id) => {
      if (!isValidObjectId(id)) return null;
      const doc = await Tag.findById(id);
      return doc ? toTag(doc) : null;
    },
    findByIds: async (ids) => orderByIds(ids, (await Tag.find({ _id: { $in: validIds(ids) } })).map(toTag)),
  },

  ingredients: {
    search: async (namePrefix) => {
      const filter = namePrefix ? { name: { $regex: `^${escapeRegex(namePrefix)}`, $options: "i" } } : {};
      return (await Ingredient.find(filter).sort({ name: 1 })).map(toIngredient);
    },
    findById: async (id) => {
      if (!isValidObjectId(id)) return null;
      const doc = await Ingredient.findById(id);
      return doc ? toIngredient(doc) : null;
    },
    findByIds: async (ids) =>
      orderByIds(ids, (await Ingredient.find({ _id: { $in: validIds(ids) } })).map(toIngredient)),
  },

  recipes: {
    create: (authorId, shortLink, draft) =>
      mongoose.connection.transaction(async (session) => {
        const doc = new Recipe({
          author: authorId,
          name: draft.name,
          image: draft.image,
          text: draft.text,
          cookingTime: draft.cookingTime,
          tags: draft.tags.map((t) => t.id),
          shortLink,
        });
        await doc.save({ session });
        await RecipeIngredient.insertMany(ingredientRows(doc._id, draft), { session });
        return toRecipe(doc);
      }),
    update: async (id, draft) => {
      if (!isValidObjectId(id)) return null;
      return mongoose.connection.transaction(async (session) => {
        const doc = await Recipe.findById(id).session(session);
        if (!doc) return null;
        doc.set({
          name: draft.name,
          image: draft.image,
          text: draft.text,
          cookingTime: draft.cookingTime,
          tags: draft.tags.map((t) => t.id),
        });
        await doc.save({ session });
        await RecipeIngredient.deleteMany({ recipe: doc._id }, { session });
        await RecipeIngredient.insertMany(ingredientRows(doc._id, draft), { session });
        return toRecipe(doc);
      });
    },
    delete: async (id) => {
      if (!isValidObjectId(id)) return false;
      return mongoose.connection.transaction(async (session) => {
        const result = await Recipe.deleteOne({ _id: id }, { session });
        if (result.deletedCount === 0) return false;
        await RecipeIngredient.deleteMany({ recipe: id }, { session });
        await Favorite.deleteMany({ recipe: id }, { session });
        await ShoppingCart.deleteMany({ recipe: id }, { session });
        return true;
      });
    },
    findById: async (id) => {
      if (!isValidObjectId(id)) return null;
      const doc = await Recipe.findById(id);
      return doc ? toRecipe(doc) : null;
    },
    findByShortLink: async (hash) => {
      const doc = await Recipe.findOne({ shortLink: hash });
      return doc ? toRecipe(doc) : null;
    },
    shortLinkExists: async (hash) => (await Recipe.exists({ shortLink: hash })) !== null,
    list: async (filters, { offset, limit }) => {
      const filter = await recipeFilter(filters);
      if (!filter) return { items: [], total: 0 };
      const [docs, total] = await Promise.all([
        Recipe.find(filter).sort({ createdAt: -1, _id: -1 }).skip(offset).limit(limit),
        Recipe.countDocuments(filter),
      ]);
      return { items: docs.map(toRecipe), total };
    },
    listByAuthor: async (authorId, limit) => {
      if (!isValidObjectId(authorId) || limit === 0) return [];
      const query = Recipe.find({ author: authorId }).sort({ createdAt: -1, _id: -1 });
      const docs = await (limit === undefined ? query : query.limit(limit));
      return docs.map(toRecipe);
    },
    countByAuthor: async (authorId) => {
      if (!isValidObjectId(authorId)) return 0;
      return Recipe.countDocuments({ author: authorId });
    },
    ingredientsOf: async (recipeId) => {
      if (!isValidObjectId(recipeId)) return [];
      const rows = await RecipeIngredient.find({ recipe: recipeId }).sort({ _id: 1 });
      const ingredients = await Ingredient.find({ _id: { $in: rows.map((r) => r.ingredient) } });
      const byId = new Map(ingredients.map((doc) => [String(doc._id), toIngredient(doc)]));
      return rows.flatMap((row) => {
        const ingredient = byId.get(String(row.ingredient));
        return ingredient ? [{ ingredient, amount: row.amount }] : [];
      });
    },
  },

  memberships: {
    add: async (kind, userId, recipeId) => {
      try {
        await relationModels[kind].create({ user: userId, recipe: recipeId });
        return true;
      } catch (e) {
        if (isDuplicateKey(e)) return false;
        throw e;
      }
    },
    remove: async (kind, userId, recipeId) => {
      if (!isValidObjectId(recipeId)) return false;
      const result = await relationModels[kind].deleteOne({ user: userId, recipe: recipeId });
      return result.deletedCount > 0;
    },
    exists: async (kind, userId, recipeId) => {
      if (!isValidObjectId(recipeId)) return false;
      return (await relationModels[kind].exists({ user: userId, recipe: recipeId })) !== null;
    },
    shoppingList: async (userId) => {
      const rows = await ShoppingCart.aggregate<{
        _id: { name: string; measurementUnit: string };
        totalAmount: number;
      }>([
        { $match: { user: new mongoose.Types.ObjectId(userId) } },
        {
          $lookup: {
            from: RecipeIngredient.collection.name,
            localField: "recipe",
            foreignField: "recipe",
            as: "line",
          },
        },
        { $unwind: "$line" },
        {
          $lookup: {
            from: Ingredient.collection.name,
            localField: "line.ingredient",
            foreignField: "_id",
            as: "ingredient",
          },
        },
        { $unwind: "$ingredient" },
        {
          $group: {
            _id: { name: "$ingredient.name", measurementUnit: "$ingredient.measurementUnit" },
            totalAmount: { $sum: "$line.amount" },
          },
        },
        { $sort: { "_id.name": 1, "_id.measurementUnit": 1 } },
      ]);
      return rows.map((row) => ({
        name: row._id.name,
        measurementUnit: row._id.measurementUnit,
        totalAmount: row.totalAmount,
      }));
    },
  },

  subscriptions: {
    add: async (userId, authorId) => {
      try {
        await Subscription.create({ user: userId, author: authorId });
        return true;
      } catch (e) {
        if (isDuplicateKey(e)) return false;
        throw e;
      }
    },
    remove: async (userId, authorId) => {
      if (!isValidObjectId(authorId)) return false;
      const result = await Subscription.deleteOne({ user: userId, author: authorId });
      return result.deletedCount > 0;
    },
    exists: async (userId, authorId) => {
      if (!isValidObjectId(authorId)) return false;
      return (await Subscription.exists({ user: userId, author: authorId })) !== null;
    },
    listAuthors: async (userId, { offset, limit }) => {
      const authorIds = await Subscription.distinct("author", { user: userId });
      const docs = await User.find({ _id: { $in: authorIds } })
        .sort({ username: 1 })
        .skip(offset)
        .limit(limit);
      return { items: docs.map(toUser), total: authorIds.length };
    },
  },
});
