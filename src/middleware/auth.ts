import jwt from "jsonwebtoken"
import { z } from "zod"
import type { NextFunction, Request, RequestHandler, Response } from "express"
import { AppError } from "../lib/errors"
import type { AuthUser } from "../types"

declare global {
  namespace Express {
    interface Request {
      user?: AuthUser
    }
  }
}

const sessionSchema = z.object({ sub: z.string(), email: z.string(), username: z.string() })

export const signSession = (user: AuthUser, secret: string, expiresInSeconds: number) =>
  jwt.sign({ sub: user.id, email: user.email, username: user.username }, secret, { expiresIn: expiresInSeconds })

/** Attaches `req.user` when a token is sent; anonymous requests pass through. */
export const authenticate =
  (secret: string): RequestHandler =>
  (req, _res, next) => {
    const header = req.headers.authorization
    if (!header) return next()
    const token = header.replace(/^(Bearer|Token)\s+/i, "")
    try {
      const payload = sessionSchema.safeParse(jwt.verify(token, secret))
      if (!payload.success) return next(new AppError("Unauthenticated", "Invalid token"))
      req.user = { id: payload.data.sub, email: payload.data.email, username: payload.data.username }
      next()
    } catch {
      next(new AppError("Unauthenticated", "Invalid token"))
    }
  }

export const requireAuth = (req: Request, _res: Response, next: NextFunction) => {
  if (!req.user) return next(new AppError("Unauthenticated", "Authentication credentials were not provided."))
  next()
}
