import type { Request } from "express";
import { z } from "zod";
import { env } from "../config/env.js";

export const paginationQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(env.PAGE_SIZE),
});

export type PageRequest = z.infer<typeof paginationQuerySchema>;

export type Page<T> = {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
};

export const pageOffset = ({ page, limit }: PageRequest) => (page - 1) * limit;

const pageUrl = (req: Request, page: number) => {
  const url = new URL(req.originalUrl, env.SERVER_URL);
  if (page === 1) {
    url.searchParams.delete("page");
  } else {
    url.searchParams.set("page", String(page));
  }
  return url.toString();
};

export const toPage = <T>(req: Request, request: PageRequest, count: number, results: T[]): Page<T> => ({
  count,
  next: request.page * request.limit < count ? pageUrl(req, request.page + 1) : null,
  previous: request.page > 1 ? pageUrl(req, request.page - 1) : null,
  results,
});
