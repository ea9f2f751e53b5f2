import "dotenv/config";
import { readFile } from "node:fs/promises";
import path from "node:path";
import mongoose from "mongoose";
import { z } from "zod";
import { loadConfig } from "../config";
import { connectMongo } from "../db";
import { Ingredient, Tag } from "../models";

const ingredientsSchema = z.array(
  z.object({ name: z.string().min(1).max(128), measurement_unit: z.string().min(1).max(64) })
);
const tagsSchema = z.array(
  z.object({ name: z.string().min(1).max(32), slug: z.string().regex(/^[-a-zA-Z0-9_]+$/).max(32) })
);

const readJson = async <S extends z.ZodTypeAny>(file: string, schema: S): Promise<z.output<S>> =>
  schema.parse(JSON.parse(await readFile(file, "utf-8")));

/** Loads reference data; rows that already exist are left alone. */
const seed = async (dataDir: string) => {
  const config = loadConfig();
  await connectMongo(config.mongoUri);

  const ingredients = await readJson(path.join(dataDir, "ingredients.json"), ingredientsSchema);
  const ingredientResult = await Ingredient.bulkWrite(
    ingredients.map((i) => ({
      updateOne: {
        filter: { name: i.name, measurementUnit: i.measurement_unit },
        update: { $setOnInsert: { name: i.name, measurementUnit: i.measurement_unit } },
        upsert: true,
      },
    }))
  );
  console.log(`✅ [SEED] ingredients: ${ingredientResult.upsertedCount} added, ${ingredients.length} in file`);

  const tags = await readJson(path.join(dataDir, "tags.json"), tagsSchema);
  const tagResult = await Tag.bulkWrite(
    tags.map((t) => ({
      updateOne: { filter: { slug: t.slug }, update: { $setOnInsert: t }, upsert: true },
    }))
  );
  console.log(`✅ [SEED] tags: ${tagResult.upsertedCount} added, ${tags.length} in file`);
};

seed(path.resolve(process.argv[2] ?? "data"))
  .catch((e) => {
    console.error("❌ [SEED] failed:", e instanceof Error ? e.message : e);
    process.exitCode = 1;
  })
  .finally(() => mongoose.disconnect());
