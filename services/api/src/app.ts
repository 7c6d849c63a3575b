import { randomUUID } from "node:crypto";
import express from "express";
import type { ApiConfig } from "./config";
import { auditLog, type AuditAction, type RequestWithMeta } from "./audit";
import { RegistryError } from "./errors";
import { FixedWindowRateLimiter } from "./rate-limit";
import { activitySchema, membershipQuerySchema, registrySchema } from "./schema";
import type { ActivityStore } from "./store";

export type AppDeps = {
  store: ActivityStore;
  config: Pick<ApiConfig, "corsAllowOrigin" | "rateWindowMs" | "rateMaxRequests">;
};

type MembershipAction = "signup" | "unregister";
const outcomes = {
  signup: { ok: "signup_ok", rejected: "signup_rejected" },
  unregister: { ok: "unregister_ok", rejected: "unregister_rejected" }
} as const satisfies Record<MembershipAction, { ok: AuditAction; rejected: AuditAction }>;

export function createApp({ store, config }: AppDeps): express.Express {
  const app = express();
  const rateLimiter = new FixedWindowRateLimiter(config.rateWindowMs, config.rateMaxRequests);

  app.disable("x-powered-by");
  app.use((req, res, next) => {
    const requestId = req.header("x-request-id")?.trim() || randomUUID();
    (req as RequestWithMeta).requestId = requestId;
    res.setHeader("x-request-id", requestId);
    next();
  });
  app.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", config.corsAllowOrigin);
    res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "content-type,x-request-id");
    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  });
  app.use((req, res, next) => {
    const bucketKey = `public:${req.ip ?? req.socket.remoteAddress ?? "unknown"}`;
    if (!rateLimiter.take(bucketKey)) {
      auditLog(req as RequestWithMeta, "rate_limit_rejected", { bucketKey });
      res.status(429).json({ detail: "rate_limited" });
      return;
    }
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true, activities: store.size() });
  });

  app.get("/activities", (_req, res) => {
    res.json(registrySchema.parse(store.list()));
  });

  app.get("/activities/:name", (req, res) => {
    const activity = store.get(req.params.name);
    if (!activity) {
      res.status(404).json({ detail: "Activity not found" });
      return;
    }
    res.json(activitySchema.parse(activity));
  });

  app.post("/activities/:name/signup", (req, res, next) => {
    handleMembership(req, res, "signup").catch(next);
  });

  app.post("/activities/:name/unregister", (req, res, next) => {
    handleMembership(req, res, "unregister").catch(next);
  });

  app.use((_req, res) => {
    res.status(404).json({ detail: "Not Found" });
  });

  app.use((error: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // express tags its own failures (bad param encoding, etc.) with a client status
    const status = "status" in error && typeof error.status === "number" ? error.status : 500;
    if (status >= 500) {
      auditLog(req as RequestWithMeta, "request_error", { message: error.message });
      res.status(status).json({ detail: "Internal Server Error" });
      return;
    }
    res.status(status).json({ detail: error.message });
  });

  async function handleMembership(
    req: express.Request,
    res: express.Response,
    action: MembershipAction
  ): Promise<void> {
    const parsed = membershipQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      auditLog(req as RequestWithMeta, "request_invalid", { reason: "invalid_query" });
      res.status(422).json({ detail: parsed.error.flatten() });
      return;
    }

    const name = req.params.name;
    const { email } = parsed.data;
    try {
      const message = action === "signup" ? await store.signup(name, email) : await store.unregister(name, email);
      auditLog(req as RequestWithMeta, outcomes[action].ok, { activity: name, email });
      res.json({ message });
    } catch (error) {
      if (!(error instanceof RegistryError)) throw error;
      auditLog(req as RequestWithMeta, outcomes[action].rejected, { activity: name, email, reason: error.message });
      res.status(error.status).json({ detail: error.message });
    }
  }

  return app;
}
