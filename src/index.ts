import "dotenv/config";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { connectMongo } from "./db";
import { DiskImageStore } from "./lib/images";
import { createMongoStore } from "./store/mongo";

const config = loadConfig();

const app = createApp({
  config,
  store: createMongoStore(),
  images: new DiskImageStore(config.mediaRoot, config.mediaUrl),
});

app.listen(config.port, () => {
  console.log(`🚀 [SERVER] listening on port ${config.port}`);
});
connectMongo(config.mongoUri).catch((e) => {
  console.error("❌ [DB] MongoDB connection failed:", e instanceof Error ? e.message : e);
});
