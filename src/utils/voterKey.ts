import { Request } from "express";
import crypto from "crypto";
import { settings } from "../config/settings";

export function getClientIp(req: Request): string {
  // req.ip already honours the "trust proxy" setting for X-Forwarded-For
  const realIp = req.headers["x-real-ip"];
  return req.ip || (typeof realIp === "string" ? realIp.trim() : "") || "unknown";
}

/**
 * Anonymous voters are told apart by a salted hash of their IP address.
 * The raw address is never stored.
 */
export function anonymousVoterKey(ip: string, secret: string = settings.voterKeySecret): string {
  const digest = crypto.createHash("sha256").update(`${secret}:${ip}`).digest("hex");
  return `device:${digest}`;
}

export function userVoterKey(userId: string): string {
  return `user:${userId}`;
}
