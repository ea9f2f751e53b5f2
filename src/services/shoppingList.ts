import { ensureAllowed } from "../lib/policy";
import { renderShoppingListPdf, shoppingListFilename, type PdfOptions } from "../lib/pdf";
import type { AuthUser, ShoppingListLine } from "../types";
import type { ServiceContext } from "./recipes";

export const aggregateShoppingList = (ctx: ServiceContext, userId: string): Promise<ShoppingListLine[]> =>
  ctx.store.memberships.shoppingList(userId);

export const downloadShoppingList = async (ctx: ServiceContext, actor: AuthUser | null, pdf: PdfOptions = {}) => {
  ensureAllowed("shoppingList.download", actor);
  const lines = await aggregateShoppingList(ctx, actor.id);
  return {
    filename: shoppingListFilename(actor.username),
    body: await renderShoppingListPdf(actor.username, lines, pdf),
  };
};
