import { Schema, Types, model } from "mongoose"
import { MAX_POSITIVE_INT, type MembershipKind } from "./types"

export interface UserRecord {
  email: string
  username: string
  firstName: string
  lastName: string
  passwordHash: string
  avatar: string | null
  createdAt: Date
}

export interface TagRecord {
  name: string
  slug: string
}

export interface IngredientRecord {
  name: string
  measurementUnit: string
}

export interface RecipeRecord {
  author: Types.ObjectId
  name: string
  image: string
  text: string
  cookingTime: number
  tags: Types.ObjectId[]
  shortLink: string
  createdAt: Date
}

export interface RecipeIngredientRecord {
  recipe: Types.ObjectId
  ingredient: Types.ObjectId
  amount: number
}

export interface RecipeRelationRecord {
  user: Types.ObjectId
  recipe: Types.ObjectId
  createdAt: Date
}

export interface SubscriptionRecord {
  user: Types.ObjectId
  author: Types.ObjectId
  createdAt: Date
}

const UserSchema = new Schema<UserRecord>({
  email: { type: String, required: true, unique: true, lowercase: true, trim: true, maxlength: 254 },
  username: { type: String, required: true, unique: true, maxlength: 150, match: /^[\w.@+-]+$/ },
  firstName: { type: String, required: true, maxlength: 150 },
  lastName: { type: String, required: true, maxlength: 150 },
  passwordHash: { type: String, required: true },
  avatar: { type: String, default: null },
  createdAt: { type: Date, default: Date.now },
})

const TagSchema = new Schema<TagRecord>({
  name: { type: String, required: true, unique: true, maxlength: 32 },
  slug: { type: String, required: true, unique: true, maxlength: 32, match: /^[-a-zA-Z0-9_]+$/ },
})

const IngredientSchema = new Schema<IngredientRecord>({
  name: { type: String, required: true, maxlength: 128 },
  measurementUnit: { type: String, required: true, maxlength: 64 },
})
IngredientSchema.index({ name: 1, measurementUnit: 1 }, { unique: true })

const RecipeSchema = new Schema<RecipeRecord>({
  author: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
  name: { type: String, required: true, maxlength: 256 },
  image: { type: String, required: true },
  text: { type: String, required: true },
  cookingTime: { type: Number, required: true, min: 1, max: MAX_POSITIVE_INT, validate: Number.isInteger },
  tags: [{ type: Schema.Types.ObjectId, ref: "Tag" }],
  shortLink: { type: String, required: true, unique: true, minlength: 6, maxlength: 6 },
  createdAt: { type: Date, default: Date.now },
})
RecipeSchema.index({ createdAt: -1 })

const RecipeIngredientSchema = new Schema<RecipeIngredientRecord>({
  recipe: { type: Schema.Types.ObjectId, ref: "Recipe", required: true },
  ingredient: { type: Schema.Types.ObjectId, ref: "Ingredient", required: true },
  amount: { type: Number, required: true, min: 1, max: MAX_POSITIVE_INT, validate: Number.isInteger },
})
RecipeIngredientSchema.index({ recipe: 1, ingredient: 1 }, { unique: true })

// Favorite and ShoppingCart share one shape and one uniqueness rule.
const recipeRelationSchema = () => {
  const schema = new Schema<RecipeRelationRecord>({
    user: { type: Schema.Types.ObjectId, ref: "User", required: true },
    recipe: { type: Schema.Types.ObjectId, ref: "Recipe", required: true, index: true },
    createdAt: { type: Date, default: Date.now },
  })
  schema.index({ user: 1, recipe: 1 }, { unique: true })
  return schema
}

const SubscriptionSchema = new Schema<SubscriptionRecord>({
  user: { type: Schema.Types.ObjectId, ref: "User", required: true },
  author: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
  createdAt: { type: Date, default: Date.now },
})
SubscriptionSchema.index({ user: 1, author: 1 }, { unique: true })
SubscriptionSchema.pre("validate", function (next) {
  if (this.user.equals(this.author)) next(new Error("A user cannot subscribe to themselves"))
  else next()
})

export const User = model<UserRecord>("User", UserSchema)
export const Tag = model<TagRecord>("Tag", TagSchema)
export const Ingredient = model<IngredientRecord>("Ingredient", IngredientSchema)
export const Recipe = model<RecipeRecord>("Recipe", RecipeSchema)
export const RecipeIngredient = model<RecipeIngredientRecord>("RecipeIngredient", RecipeIngredientSchema)
export const Favorite = model<RecipeRelationRecord>("Favorite", recipeRelationSchema())
export const ShoppingCart = model<RecipeRelationRecord>("ShoppingCart", recipeRelationSchema(), "shopping_cart")
export const Subscription = model<SubscriptionRecord>("Subscription", SubscriptionSchema)

export const relationModels = {
  favorite: Favorite,
  shopping_cart: ShoppingCart,
} satisfies Record<MembershipKind, typeof Favorite>
