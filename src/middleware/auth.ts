import jwt from "jsonwebtoken";
import { Request, Response, NextFunction } from "express";
import { settings } from "../config/settings";

export type UserRole = "user" | "admin";

export type AuthUser = {
  id: string;
  role: UserRole;
};

declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

function readToken(req: Request): string | undefined {
  const authHeader = req.headers.authorization;
  if (authHeader && authHeader.startsWith("Bearer ")) {
    return authHeader.replace("Bearer ", "");
  }
  const cookieToken: unknown = req.cookies?.accessToken;
  return typeof cookieToken === "string" && cookieToken ? cookieToken : undefined;
}

function toAuthUser(decoded: string | jwt.JwtPayload): AuthUser | null {
  if (typeof decoded === "string") return null;
  const id: unknown = decoded.id;
  if (typeof id !== "string" || !id) return null;
  return { id, role: decoded.role === "admin" ? "admin" : "user" };
}

type TokenCheck =
  | { valid: true; user: AuthUser }
  | { valid: false; message: string; code?: string };

function checkToken(token: string): TokenCheck {
  try {
    const decoded = jwt.verify(token, settings.jwtSecret);

    // For access tokens with type field, verify it's an access token
    if (typeof decoded !== "string" && decoded.type && decoded.type !== "access") {
      return { valid: false, message: "Invalid token type" };
    }

    const user = toAuthUser(decoded);
    if (!user) return { valid: false, message: "Invalid token" };
    return { valid: true, user };
  } catch (err: unknown) {
    if (err instanceof jwt.TokenExpiredError) {
      return { valid: false, message: "Token expired", code: "TOKEN_EXPIRED" };
    }
    return { valid: false, message: "Token error" };
  }
}

/**
 * Verifies the bearer token (or the accessToken cookie) and exposes the
 * caller as req.user. Tokens are issued elsewhere.
 */
export const protect = (req: Request, res: Response, next: NextFunction) => {
  const token = readToken(req);
  if (!token) {
    return res.status(401).json({ success: false, message: "No token provided" });
  }

  const check = checkToken(token);
  if (!check.valid) {
    return res.status(401).json({ success: false, message: check.message, code: check.code });
  }
  req.user = check.user;
  next();
};

/** Like protect, but a request without any token goes through anonymously. */
export const optionalAuth = (req: Request, res: Response, next: NextFunction) => {
  const token = readToken(req);
  if (!token) return next();

  const check = checkToken(token);
  if (!check.valid) {
    return res.status(401).json({ success: false, message: check.message, code: check.code });
  }
  req.user = check.user;
  next();
};

export const adminOnly = (req: Request, res: Response, next: NextFunction) => {
  if (!req.user || req.user.role !== "admin") {
    return res.status(403).json({
      success: false,
      message: "Admin access only",
    });
  }
  next();
};

export const canManage = (user: AuthUser | undefined, creatorId: string) =>
  !!user && (user.role === "admin" || user.id === creatorId);
