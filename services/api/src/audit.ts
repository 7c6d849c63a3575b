import type express from "express";

export type RequestWithMeta = express.Request & { requestId?: string };

export type AuditAction =
  | "signup_ok"
  | "signup_rejected"
  | "unregister_ok"
  | "unregister_rejected"
  | "request_invalid"
  | "request_error"
  | "rate_limit_rejected"
  | "listening"
  | "shutdown";

export function auditLog(req: RequestWithMeta | undefined, action: AuditAction, fields: Record<string, unknown> = {}) {
  const requestFields = req
    ? {
        requestId: req.requestId ?? "unknown",
        method: req.method,
        path: req.originalUrl.split("?")[0] ?? req.path
      }
    : {};
  console.log(
    JSON.stringify({
      ts: new Date().toISOString(),
      service: "activities-api",
      action,
      ...requestFields,
      ...fields
    })
  );
}
