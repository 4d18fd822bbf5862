import mongoose from "mongoose";
import { settings } from "./settings";

export async function connectDB(uri: string = settings.mongoUri) {
  if (!uri) {
    throw new Error("MONGO_URI is required");
  }

  mongoose.connection.on("error", (err) => {
    console.error("[DB] Connection error:", err);
  });
  mongoose.connection.on("disconnected", () => {
    console.warn("[DB] Disconnected");
  });

  await mongoose.connect(uri);
  // the one-ballot-per-voter rule relies on the unique ballot index
  await mongoose.connection.syncIndexes();
  console.log("[DB] Connected:", mongoose.connection.name);
}

export async function disconnectDB() {
  await mongoose.disconnect();
}
