import bcrypt from "bcryptjs";
import { z } from "zod";
import { AppError, parseWith } from "../lib/errors";
import { ensureAllowed } from "../lib/policy";
import { toShortRecipe, toUserView, type AuthorView, type UserView } from "../lib/presenters";
import type { Store } from "../store/types";
import type { AuthUser, PageWindow, Slice, User } from "../types";
import type { ServiceContext } from "./recipes";

const PASSWORD_ROUNDS = 10;

const registerSchema = z.object({
  email: z.string().trim().email().max(254),
  username: z
    .string()
    .trim()
    .min(1)
    .max(150)
    .regex(/^[\w.@+-]+$/, "letters, digits and @/./+/-/_ only"),
  first_name: z.string().trim().min(1).max(150),
  last_name: z.string().trim().min(1).max(150),
  password: z.string().min(8).max(128),
});

const loginSchema = z.object({
  email: z.string().trim().min(1),
  password: z.string().min(1),
});

const setPasswordSchema = z.object({
  current_password: z.string().min(1),
  new_password: z.string().min(8).max(128),
});

const avatarSchema = z.object({ avatar: z.string().min(1) });

export const findUser = async (store: Store, id: string): Promise<User> => {
  const user = await store.users.findById(id);
  if (!user) throw new AppError("NotFound", "User not found.");
  return user;
};

export const toAuthUser = (user: User): AuthUser => ({ id: user.id, email: user.email, username: user.username });

export const describeUser = async (ctx: ServiceContext, user: User, viewer: AuthUser | null): Promise<UserView> => {
  const isSubscribed = viewer ? await ctx.store.subscriptions.exists(viewer.id, user.id) : false;
  return toUserView(user, isSubscribed);
};

/** Profile plus the author's newest recipes, at most `recipesLimit` of them. */
export const describeAuthor = async (
  ctx: ServiceContext,
  author: User,
  viewer: AuthUser | null,
  recipesLimit?: number
): Promise<AuthorView> => {
  const [profile, recipes, recipesCount] = await Promise.all([
    describeUser(ctx, author, viewer),
    ctx.store.recipes.listByAuthor(author.id, recipesLimit),
    ctx.store.recipes.countByAuthor(author.id),
  ]);
  return { ...profile, recipes: recipes.map(toShortRecipe), recipes_count: recipesCount };
};

export const registerUser = async (ctx: ServiceContext, body: unknown) => {
  const input = parseWith(registerSchema, body);
  if (await ctx.store.users.findByEmail(input.email)) {
    throw new AppError("AlreadyExists", "A user with that email already exists.", "email");
  }
  if (await ctx.store.users.findByUsername(input.username)) {
    throw new AppError("AlreadyExists", "A user with that username already exists.", "username");
  }
  const user = await ctx.store.users.create({
    email: input.email,
    username: input.username,
    firstName: input.first_name,
    lastName: input.last_name,
    passwordHash: await bcrypt.hash(input.password, PASSWORD_ROUNDS),
  });
  console.log(`✅ [USERS] registered ${user.username}`);
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    first_name: user.firstName,
    last_name: user.lastName,
  };
};

export const verifyCredentials = async (ctx: ServiceContext, body: unknown): Promise<AuthUser> => {
  const input = parseWith(loginSchema, body);
  const user = await ctx.store.users.findByEmail(input.email);
  if (!user || !(await bcrypt.compare(input.password, user.passwordHash))) {
    throw new AppError("InvalidCredentials", "Unable to log in with provided credentials.");
  }
  return toAuthUser(user);
};

export const getUser = async (ctx: ServiceContext, viewer: AuthUser | null, id: string) =>
  describeUser(ctx, await findUser(ctx.store, id), viewer);

export const getMe = async (ctx: ServiceContext, actor: AuthUser | null) => {
  ensureAllowed("profile.read", actor);
  return describeUser(ctx, await findUser(ctx.store, actor.id), actor);
};

export const listUsers = async (
  ctx: ServiceContext,
  viewer: AuthUser | null,
  window: PageWindow
): Promise<Slice<UserView>> => {
  const page = await ctx.store.users.list(window);
  const items = await Promise.all(page.items.map((user) => describeUser(ctx, user, viewer)));
  return { items, total: page.total };
};

export const setPassword = async (ctx: ServiceContext, actor: AuthUser | null, body: unknown) => {
  ensureAllowed("profile.update", actor);
  const input = parseWith(setPasswordSchema, body);
  const user = await findUser(ctx.store, actor.id);
  if (!(await bcrypt.compare(input.current_password, user.passwordHash))) {
    throw new AppError("InvalidField", "current_password: the password is incorrect.", "current_password");
  }
  await ctx.store.users.update(user.id, { passwordHash: await bcrypt.hash(input.new_password, PASSWORD_ROUNDS) });
};

export const setAvatar = async (ctx: ServiceContext, actor: AuthUser | null, body: unknown) => {
  ensureAllowed("profile.update", actor);
  const input = parseWith(avatarSchema, body);
  const user = await findUser(ctx.store, actor.id);
  const avatar = await ctx.images.save(input.avatar, "avatars");
  await ctx.store.users.update(user.id, { avatar });
  if (user.avatar) await ctx.images.remove(user.avatar);
  return { avatar };
};

export const removeAvatar = async (ctx: ServiceContext, actor: AuthUser | null) => {
  ensureAllowed("profile.update", actor);
  const user = await findUser(ctx.store, actor.id);
  if (!user.avatar) return;
  await ctx.store.users.update(user.id, { avatar: null });
  await ctx.images.remove(user.avatar);
};
