import type { ErrorRequestHandler, Request, RequestHandler, Response } from "express"
import { ZodError } from "zod"
import { AppError, fromZodError } from "../lib/errors"

/** Forwards a rejected handler promise to the error middleware. */
export const handle =
  (fn: (req: Request, res: Response) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    fn(req, res).catch(next)
  }

export const notFound: RequestHandler = (_req, res) => {
  res.status(404).json({ error: "Not found", code: "NotFound" })
}

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (err instanceof AppError) return res.status(err.status).json(err.toJSON())
  if (err instanceof ZodError) {
    const appError = fromZodError(err)
    return res.status(appError.status).json(appError.toJSON())
  }
  // body-parser errors carry their own 4xx status
  if (typeof err?.status === "number" && err.status >= 400 && err.status < 500) {
    const message = err instanceof SyntaxError ? "Malformed JSON body" : String(err.message)
    return res.status(err.status).json({ error: message, code: "InvalidField" })
  }
  console.error(`❌ [SERVER] ${req.method} ${req.originalUrl} failed:`, err)
  res.status(500).json({ error: "Internal server error" })
}
