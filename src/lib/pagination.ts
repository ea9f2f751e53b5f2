import type { Request } from "express";
import type { PageWindow } from "../types";
import { AppError } from "./errors";

export type PageRequest = PageWindow & { page: number };

export type Paginated<T> = {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
};

export const queryString = (value: unknown): string | undefined => {
  if (typeof value === "string") return value;
  if (Array.isArray(value) && typeof value[0] === "string") return value[0];
  return undefined;
};

export const queryList = (value: unknown): string[] => {
  if (typeof value === "string") return [value];
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === "string");
  return [];
};

const positiveInt = (raw: string | undefined) => {
  if (raw === undefined || !/^\d+$/.test(raw)) return undefined;
  const n = Number(raw);
  return Number.isSafeInteger(n) && n > 0 ? n : undefined;
};

/** `page` is 1-based; a malformed `limit` falls back to the default size. */
export const parsePageRequest = (
  query: Request["query"],
  options: { pageSize: number; maxPageSize: number }
): PageRequest => {
  const rawPage = queryString(query.page);
  const page = rawPage === undefined ? 1 : positiveInt(rawPage);
  if (page === undefined) throw new AppError("NotFound", "Invalid page.");
  const limit = Math.min(positiveInt(queryString(query.limit)) ?? options.pageSize, options.maxPageSize);
  const offset = (page - 1) * limit;
  if (!Number.isSafeInteger(offset)) throw new AppError("NotFound", "Invalid page.");
  return { page, limit, offset };
};

const pageUrl = (req: Request, page: number) => {
  const url = new URL(req.originalUrl, `${req.protocol}://${req.get("host") ?? "localhost"}`);
  if (page === 1) url.searchParams.delete("page");
  else url.searchParams.set("page", String(page));
  return url.toString();
};

export const paginate = <T>(req: Request, request: PageRequest, total: number, results: T[]): Paginated<T> => {
  if (request.page > 1 && request.offset >= total) throw new AppError("NotFound", "Invalid page.");
  return {
    count: total,
    next: request.offset + results.length < total ? pageUrl(req, request.page + 1) : null,
    previous: request.page > 1 ? pageUrl(req, request.page - 1) : null,
    results,
  };
};
