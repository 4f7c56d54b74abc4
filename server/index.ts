// server/index.ts
import { checkDatabaseHealth, closeDatabase } from "./config/database.js";
import { env, envFile, webOrigins } from "./config/env.js";
import app from "./app.js";

if (envFile) {
  console.log(`[boot] env loaded: ${envFile}`);
} else {
  console.warn("[boot] no .env.local or .env found in", process.cwd());
}

if (!(await checkDatabaseHealth())) {
  console.error("[db] connection failed");
  process.exit(1);
}
console.log("[db] connected");

const server = app.listen(env.PORT, env.HOST, () => {
  console.log(`[express] Vegan catalog API running on http://${env.HOST}:${env.PORT}`);
  console.log(`[express] Environment: ${env.NODE_ENV}`);
  console.log(`[express] CORS origins: ${webOrigins.join(", ")}`);
});

// Keep-alive must outlast the proxy's to avoid ECONNRESET.
server.keepAliveTimeout = 65_000;
server.headersTimeout = 66_000;

function shutdown(signal: string) {
  console.log(`[boot] ${signal} received, shutting down`);
  server.close(() => {
    closeDatabase()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("[db] failed to close pool:", err);
        process.exit(1);
      });
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
