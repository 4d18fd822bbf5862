import dotenv from "dotenv";
dotenv.config();

export type Settings = {
  env: string;
  port: number;
  mongoUri: string;
  jwtSecret: string;
  voterKeySecret: string;
  maxBallotsPerIpPerHour: number;
  corsOrigins: string[];
};

const DEFAULT_CORS_ORIGINS = ["http://localhost:3000", "http://localhost:5173"];

const toPositiveInt = (value: string | undefined, fallback: number) => {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const jwtSecret = env.JWT_SECRET || "";
  const corsOrigins = (env.CORS_ORIGINS || "")
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    env: env.NODE_ENV || "development",
    port: toPositiveInt(env.PORT, 5000),
    mongoUri: env.MONGO_URI || "",
    jwtSecret,
    voterKeySecret: env.VOTER_KEY_SECRET || jwtSecret,
    maxBallotsPerIpPerHour: toPositiveInt(env.MAX_BALLOTS_PER_IP_PER_HOUR, 5),
    corsOrigins: corsOrigins.length > 0 ? corsOrigins : DEFAULT_CORS_ORIGINS,
  };
}

export const settings = loadSettings();
