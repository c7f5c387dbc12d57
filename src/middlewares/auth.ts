import { NextFunction, Request, Response } from "express";
import jwt from "jsonwebtoken";
import { config } from "../config";
import { Store } from "../repositories/types";
import { User } from "../types/models";
import { UnauthenticatedError } from "../utils/errors";

export interface AuthRequest<B = unknown> extends Request<Record<string, string>, unknown, B> {
  user?: User;
}

function userIdFromToken(token: string, secret: string) {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret);
  } catch {
    throw new UnauthenticatedError("Invalid token");
  }
  const id = typeof decoded === "object" ? Number(decoded.sub) : NaN;
  if (!Number.isInteger(id) || id <= 0) {
    throw new UnauthenticatedError("Invalid token");
  }
  return id;
}

/** Resolves the caller from an `Authorization: Bearer <jwt>` header whose `sub` is a user id. */
export async function userFromAuthorization(
  store: Store,
  header: string | undefined,
  secret: string
): Promise<User> {
  const [scheme, token] = (header ?? "").split(" ");
  if (scheme.toLowerCase() !== "bearer" || !token) {
    throw new UnauthenticatedError();
  }
  const user = await store.users.findById(userIdFromToken(token, secret));
  if (!user) {
    throw new UnauthenticatedError("User not found");
  }
  return user;
}

export const authenticate =
  (store: Store, secret = config.JWT_SECRET) =>
  async (req: AuthRequest, _res: Response, next: NextFunction) => {
    try {
      req.user = await userFromAuthorization(store, req.headers.authorization, secret);
      next();
    } catch (err) {
      next(err);
    }
  };

export function currentUser(req: AuthRequest): User {
  if (!req.user) {
    throw new UnauthenticatedError();
  }
  return req.user;
}
