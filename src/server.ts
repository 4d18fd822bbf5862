import { createMongoApp } from "./app";
import { connectDB, disconnectDB } from "./config/connectDB";
import { settings } from "./config/settings";

async function start() {
  if (!settings.jwtSecret) {
    throw new Error("JWT_SECRET is required");
  }
  await connectDB();

  const app = createMongoApp();
  const server = app.listen(settings.port, () => {
    console.log("Server running on port", settings.port);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close(() => {
      disconnectDB()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error("[DB] Failed to disconnect:", error);
          process.exit(1);
        });
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

start().catch((error: unknown) => {
  console.error("[Server] Failed to start:", error);
  process.exit(1);
});
