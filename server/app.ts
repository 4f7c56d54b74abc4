import express from "express";
import cors from "cors";
import { env, webOrigins } from "./config/env.js";
import { registerRoutes } from "./routes.js";

const app = express();

// Trust proxy when running behind a reverse proxy
app.set("trust proxy", 1);

const CORS_ALLOW_ALL = env.CORS_ALLOW_ALL === "1";

const escapeRegex = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
const toOrigin = (value: string): string => {
  try {
    return new URL(value).origin;
  } catch {
    return value;
  }
};

const exactOrigins = new Set<string>();
const wildcardOriginMatchers: RegExp[] = [];

for (const entry of webOrigins) {
  if (entry.includes("*")) {
    // Allow wildcard patterns, e.g. https://catalog-preview-*.example.com
    const pattern = `^${escapeRegex(entry).replace(/\\\*/g, ".*")}$`;
    wildcardOriginMatchers.push(new RegExp(pattern, "i"));
    continue;
  }
  exactOrigins.add(toOrigin(entry));
}

const isOriginAllowed = (origin: string) => {
  const normalizedOrigin = toOrigin(origin);
  if (exactOrigins.has(normalizedOrigin)) return true;
  return wildcardOriginMatchers.some((re) => re.test(normalizedOrigin));
};

// IMPORTANT: keep header names lowercase
const corsOptions: cors.CorsOptions = {
  origin(origin, cb) {
    if (!origin) return cb(null, true); // allow server-to-server / curl
    if (CORS_ALLOW_ALL) return cb(null, true);
    if (isOriginAllowed(origin)) return cb(null, true);
    return cb(new Error(`Origin ${origin} not allowed by CORS`));
  },
  methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
  allowedHeaders: ["content-type", "accept", "authorization", "x-api-key"],
  credentials: true,
  maxAge: 86400,
};

// MUST be before any routes or auth middleware
app.use(cors(corsOptions));
app.options("*", cors(corsOptions));

app.use(express.json());
app.use(express.urlencoded({ extended: true }));

registerRoutes(app);

export default app;
