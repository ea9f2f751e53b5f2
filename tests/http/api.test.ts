import type { Server } from "node:http";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { createApp } from "../../src/app";
import { loadConfig } from "../../src/config";
import { MemoryImageStore } from "../../src/store/memory";
import { PNG, seededStore } from "../support/fixtures";

const store = seededStore();
const app = createApp({
  config: loadConfig({ JWT_SECRET: "test-secret", SHORT_LINK_BASE_URL: "http://short.test/s/" }),
  store,
  images: new MemoryImageStore(),
});

let server: Server;
let baseUrl = "";

beforeAll(async () => {
  server = app.listen(0);
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server is not bound to a port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((e) => (e ? reject(e) : resolve())));
});

type CallOptions = { token?: string; body?: unknown };

const call = async (method: string, path: string, { token, body }: CallOptions = {}) => {
  const headers: Record<string, string> = {};
  if (token) headers.Authorization = `Token ${token}`;
  if (body !== undefined) headers["Content-Type"] = "application/json";
  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
    redirect: "manual",
  });
  const text = await res.text();
  const isJson = (res.headers.get("content-type") ?? "").startsWith("application/json");
  return { status: res.status, headers: res.headers, json: isJson && text ? JSON.parse(text) : undefined };
};

const register = (username: string) =>
  call("POST", "/api/users", {
    body: {
      email: `${username}@example.com`,
      username,
      first_name: username,
      last_name: "Tester",
      password: "test-password",
    },
  });

const login = async (username: string): Promise<string> => {
  const res = await call("POST", "/api/auth/token/login", {
    body: { email: `${username}@example.com`, password: "test-password" },
  });
  return res.json.auth_token;
};

describe("recipe api", () => {
  let alice = "";
  let bob = "";
  let ids: Record<string, string> = {};
  let recipeId = "";

  beforeAll(async () => {
    expect((await register("alice")).status).toBe(201);
    expect((await register("bob")).status).toBe(201);
    alice = await login("alice");
    bob = await login("bob");
    const ingredients = (await call("GET", "/api/ingredients")).json;
    const tags = (await call("GET", "/api/tags")).json;
    ids = Object.fromEntries(
      [...ingredients, ...tags].map((item: { id: string; name: string }) => [item.name, item.id])
    );
  });

  const body = (overrides: Record<string, unknown> = {}) => ({
    name: "Pancakes",
    text: "Whisk everything and fry.",
    image: PNG,
    cooking_time: 15,
    ingredients: [
      { id: ids.eggs, amount: 2 },
      { id: ids.flour, amount: 100 },
    ],
    tags: [ids.Breakfast],
    ...overrides,
  });

  it("rejects a duplicate registration and bad credentials", async () => {
    const duplicate = await register("alice");
    expect(duplicate.status).toBe(400);
    expect(duplicate.json).toMatchObject({ code: "AlreadyExists", field: "email" });

    const bad = await call("POST", "/api/auth/token/login", {
      body: { email: "alice@example.com", password: "wrong-password" },
    });
    expect(bad.status).toBe(400);
    expect(bad.json.code).toBe("InvalidCredentials");
  });

  it("returns the current user", async () => {
    expect((await call("GET", "/api/users/me")).status).toBe(401);
    const me = await call("GET", "/api/users/me", { token: alice });
    expect(me.json).toMatchObject({ username: "alice", email: "alice@example.com", is_subscribed: false });
  });

  it("rejects a bad token", async () => {
    const res = await call("GET", "/api/recipes", { token: "not-a-token" });
    expect(res.status).toBe(401);
    expect(res.json.code).toBe("Unauthenticated");
  });

  it("requires a signed-in user to create a recipe", async () => {
    const res = await call("POST", "/api/recipes", { body: body() });
    expect(res.status).toBe(401);
    expect(res.json.code).toBe("Unauthenticated");
  });

  it("reports composition errors", async () => {
    const duplicate = await call("POST", "/api/recipes", {
      token: alice,
      body: body({ ingredients: [{ id: ids.eggs, amount: 1 }, { id: ids.eggs, amount: 2 }] }),
    });
    expect(duplicate.status).toBe(400);
    expect(duplicate.json).toMatchObject({ code: "DuplicateReference", field: "ingredients" });

    const missing = await call("POST", "/api/recipes", { token: alice, body: body({ tags: [] }) });
    expect(missing.json).toMatchObject({ code: "MissingField", field: "tags" });
  });

  it("creates a recipe", async () => {
    const res = await call("POST", "/api/recipes", { token: alice, body: body() });
    expect(res.status).toBe(201);
    expect(res.json.author.username).toBe("alice");
    expect(res.json.ingredients).toHaveLength(2);
    expect(res.json.image).toMatch(/^\/media\/recipes\//);
    recipeId = res.json.id;

    const fetched = await call("GET", `/api/recipes/${recipeId}`);
    expect(fetched.json.name).toBe("Pancakes");
    expect(fetched.json.is_favorited).toBe(false);
  });

  it("paginates the recipe list", async () => {
    await call("POST", "/api/recipes", { token: bob, body: body({ name: "Stew", tags: [ids.Dinner] }) });

    const first = await call("GET", "/api/recipes?limit=1");
    expect(first.json.count).toBe(2);
    expect(first.json.results.map((r: { name: string }) => r.name)).toEqual(["Stew"]);
    expect(first.json.previous).toBeNull();
    expect(first.json.next).toBe(`${baseUrl}/api/recipes?limit=1&page=2`);

    const second = await call("GET", "/api/recipes?limit=1&page=2");
    expect(second.json.results.map((r: { name: string }) => r.name)).toEqual(["Pancakes"]);
    expect(second.json.next).toBeNull();
    expect(second.json.previous).toBe(`${baseUrl}/api/recipes?limit=1`);

    expect((await call("GET", "/api/recipes?page=9")).status).toBe(404);
    expect((await call("GET", "/api/recipes?page=100000000000000000000")).status).toBe(404);
  });

  it("forbids editing another user's recipe", async () => {
    const res = await call("PATCH", `/api/recipes/${recipeId}`, { token: bob, body: body({ name: "Mine now" }) });
    expect(res.status).toBe(403);
    expect(res.json.code).toBe("Forbidden");
  });

  it("toggles a favorite once each way", async () => {
    const added = await call("POST", `/api/recipes/${recipeId}/favorite`, { token: bob });
    expect(added.status).toBe(201);
    expect(added.json).toEqual({ id: recipeId, name: "Pancakes", image: expect.any(String), cooking_time: 15 });

    const again = await call("POST", `/api/recipes/${recipeId}/favorite`, { token: bob });
    expect(again.status).toBe(400);
    expect(again.json.code).toBe("AlreadyExists");

    const favorites = await call("GET", "/api/recipes?is_favorited=1", { token: bob });
    expect(favorites.json.results.map((r: { id: string }) => r.id)).toEqual([recipeId]);
    expect((await call("GET", "/api/recipes?is_favorited=maybe", { token: bob })).status).toBe(400);

    expect((await call("DELETE", `/api/recipes/${recipeId}/favorite`, { token: bob })).status).toBe(204);
    const gone = await call("DELETE", `/api/recipes/${recipeId}/favorite`, { token: bob });
    expect(gone.status).toBe(404);
    expect(gone.json.code).toBe("NotFound");
  });

  it("downloads the shopping cart as a pdf", async () => {
    expect((await call("POST", `/api/recipes/${recipeId}/shopping_cart`, { token: alice })).status).toBe(201);

    const res = await fetch(`${baseUrl}/api/recipes/download_shopping_cart`, {
      headers: { Authorization: `Token ${alice}` },
    });
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("application/pdf");
    expect(res.headers.get("content-disposition")).toBe('attachment; filename="shopping_cart_alice.pdf"');
    const pdf = Buffer.from(await res.arrayBuffer());
    expect(pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-");

    expect((await call("GET", "/api/recipes/download_shopping_cart")).status).toBe(401);
  });

  it("redirects a short link to the recipe", async () => {
    const link = await call("GET", `/api/recipes/${recipeId}/get-link`);
    const url: string = link.json["short-link"];
    expect(url).toMatch(/^http:\/\/short\.test\/s\/[A-Za-z0-9]{6}$/);

    const hash = url.slice("http://short.test/s/".length);
    const res = await call("GET", `/s/${hash}`);
    expect(res.status).toBe(302);
    expect(res.headers.get("location")).toBe(`/recipes/${recipeId}`);

    expect((await call("GET", "/s/none00")).status).toBe(404);
  });

  it("manages subscriptions", async () => {
    const aliceId: string = (await call("GET", "/api/users/me", { token: alice })).json.id;

    const self = await call("POST", `/api/users/${aliceId}/subscribe`, { token: alice });
    expect(self.status).toBe(400);
    expect(self.json.code).toBe("SelfReferenceForbidden");

    const sub = await call("POST", `/api/users/${aliceId}/subscribe?recipes_limit=1`, { token: bob });
    expect(sub.status).toBe(201);
    expect(sub.json).toMatchObject({ username: "alice", is_subscribed: true, recipes_count: 1 });
    expect(sub.json.recipes).toHaveLength(1);

    const list = await call("GET", "/api/users/subscriptions", { token: bob });
    expect(list.json.count).toBe(1);
    expect(list.json.results[0].username).toBe("alice");

    const huge = await call("GET", "/api/users/subscriptions?recipes_limit=100000000000000000000", { token: bob });
    expect(huge.status).toBe(400);
    expect(huge.json).toMatchObject({ code: "InvalidField", field: "recipes_limit" });

    expect((await call("DELETE", `/api/users/${aliceId}/subscribe`, { token: bob })).status).toBe(204);
    expect((await call("DELETE", `/api/users/${aliceId}/subscribe`, { token: bob })).status).toBe(404);
  });

  it("searches ingredients by prefix", async () => {
    const res = await call("GET", "/api/ingredients?name=FL");
    expect(res.json).toEqual([{ id: ids.flour, name: "flour", measurement_unit: "g" }]);
  });

  it("deletes a recipe as its author", async () => {
    expect((await call("DELETE", `/api/recipes/${recipeId}`, { token: bob })).status).toBe(403);
    expect((await call("DELETE", `/api/recipes/${recipeId}`, { token: alice })).status).toBe(204);
    expect((await call("GET", `/api/recipes/${recipeId}`)).status).toBe(404);
    expect(store.counts().shoppingCart).toBe(0);
  });
});
