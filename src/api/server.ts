import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { corsOptions } from "../lib/cors-config.js";
import { ADMIN_SECRET_HEADER } from "./middleware/admin-guard.js";
import raffleRouter from "./routes/raffle.js";
import accountsRouter from "./routes/accounts.js";

const app = new Hono();

// Middleware
app.use("*", logger());
app.use(
  "*",
  cors(
    corsOptions(["GET", "POST", "OPTIONS"], [
      "Content-Type",
      "Accept",
      ADMIN_SECRET_HEADER,
    ])
  )
);

// API Routes
app.route("/api/raffle", raffleRouter);
app.route("/api/accounts", accountsRouter);

// Health check
app.get("/health", (c) => c.json({ status: "ok" }));

app.notFound((c) => c.json({ error: "Not found" }, 404));

export default app;
