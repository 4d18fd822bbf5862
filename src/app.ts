import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import cookieParser from "cookie-parser";
import rateLimit from "express-rate-limit";
import helmet from "helmet";
import mongoSanitize from "express-mongo-sanitize";
import hpp from "hpp";
import { settings } from "./config/settings";
import { buildVoteRouter } from "./routes/vote.routes";
import { FLAGS_PER_IP_PER_MINUTE } from "./constants/moderation";
import { MongoBallotStore } from "./services/ballotStore";
import { MongoFlagStore } from "./services/flagStore";
import { MongoVoteStore } from "./services/voteStore";
import { AppDependencies } from "./types/dependencies";

type HttpError = {
  message?: string;
  stack?: string;
  name?: string;
  type?: string;
  status?: number;
  statusCode?: number;
  code?: string;
};

const toHttpError = (err: unknown): HttpError => {
  if (typeof err !== "object" || err === null) return { message: String(err) };
  const read = (key: string): unknown => Reflect.get(err, key);
  const text = (key: string) => {
    const value = read(key);
    return typeof value === "string" ? value : undefined;
  };
  const num = (key: string) => {
    const value = read(key);
    return typeof value === "number" ? value : undefined;
  };
  return {
    message: text("message"),
    stack: text("stack"),
    name: text("name"),
    type: text("type"),
    status: num("status"),
    statusCode: num("statusCode"),
    code: text("code"),
  };
};

/**
 * Builds the Express app around the given stores. The app never listens;
 * src/server.ts does that.
 */
export function createApp(deps: AppDependencies) {
  const app = express();

  // Behind a reverse proxy: req.ip comes from X-Forwarded-For
  app.set("trust proxy", 1);

  // -----------------------------------------
  // SECURITY MIDDLEWARE
  // -----------------------------------------
  app.use(
    helmet({
      contentSecurityPolicy: false, // API only
      crossOriginEmbedderPolicy: false,
    })
  );

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true, limit: "1mb" }));
  app.use(cookieParser());

  app.use(
    mongoSanitize({
      replaceWith: "_",
      onSanitize: ({ req, key }) => {
        console.warn(`[Security] NoSQL injection attempt blocked: ${key} in ${req.originalUrl}`);
      },
    })
  );

  app.use(hpp());

  // -----------------------------------------
  // RATE LIMITING
  // -----------------------------------------
  const globalLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 1000,
    message: { success: false, message: "Too many requests, please try again later." },
    standardHeaders: true,
    legacyHeaders: false,
  });

  const ballotLimiter = rateLimit({
    windowMs: 60 * 60 * 1000,
    max: settings.maxBallotsPerIpPerHour,
    message: {
      success: false,
      message: "Too many vote submissions, please try again later.",
      code: "RATE_LIMITED",
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

  const flagLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: FLAGS_PER_IP_PER_MINUTE,
    message: {
      success: false,
      message: `Rate limit exceeded. Maximum ${FLAGS_PER_IP_PER_MINUTE} flags per minute.`,
      code: "RATE_LIMITED",
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use(globalLimiter);

  // -----------------------------------------
  // CORS CONFIG
  // -----------------------------------------
  const allowedOrigins = settings.corsOrigins;

  app.options(
    "*",
    cors({
      origin: allowedOrigins,
      credentials: true,
      methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "X-Requested-With"],
      maxAge: 86400,
    })
  );

  app.use(
    cors({
      origin: (origin, callback) => {
        // no origin: curl, server-to-server
        if (!origin) return callback(null, true);
        if (allowedOrigins.includes(origin)) {
          return callback(null, true);
        }
        console.log("CORS blocked origin:", origin);
        return callback(new Error("Not allowed by CORS"), false);
      },
      credentials: true,
      methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "X-Requested-With"],
    })
  );

  // -----------------------------------------
  // API ROUTES
  // -----------------------------------------
  app.use("/api/votes", buildVoteRouter(deps, { ballotLimiter, flagLimiter }));

  // -----------------------------------------
  // HEALTH CHECK
  // -----------------------------------------
  app.get("/", (_req: Request, res: Response) => {
    res.json({
      success: true,
      message: "Value vote API is running",
      env: settings.env,
    });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ success: false, message: "Route not found", code: "NOT_FOUND" });
  });

  // -----------------------------------------
  // GLOBAL ERROR HANDLER
  // -----------------------------------------
  // Must stay last: anything thrown ends up here as JSON
  app.use((thrown: unknown, req: Request, res: Response, _next: NextFunction) => {
    const err = toHttpError(thrown);
    console.error("[GlobalError]", {
      message: err.message,
      stack: settings.env === "development" ? err.stack : undefined,
      path: req.path,
      method: req.method,
    });

    if (err.name === "PayloadTooLargeError" || err.type === "entity.too.large") {
      return res.status(413).json({
        success: false,
        message: "Request body too large. Maximum size is 1MB",
        code: "PAYLOAD_TOO_LARGE",
      });
    }

    if (err.name === "SyntaxError" && err.type === "entity.parse.failed") {
      return res.status(400).json({
        success: false,
        message: "Invalid JSON in request body",
        code: "INVALID_JSON",
      });
    }

    const statusCode = err.statusCode || err.status || 500;
    const message =
      settings.env === "production" ? "An unexpected error occurred" : err.message || "Unknown error";

    return res.status(statusCode).json({
      success: false,
      message,
      code: err.code || "INTERNAL_ERROR",
    });
  });

  return app;
}

export function createMongoApp() {
  return createApp({
    voteStore: new MongoVoteStore(),
    ballotStore: new MongoBallotStore(),
    flagStore: new MongoFlagStore(),
  });
}
