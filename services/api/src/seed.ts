import fs from "node:fs";
import type { ActivityRegistry } from "@activities/sdk";
import { registrySchema } from "./schema";

export function loadSeed(filePath: string): ActivityRegistry {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new Error(`Failed to read activity seed ${filePath}: ${(error as Error).message}`);
  }

  const parsed = registrySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "";
    throw new Error(`Invalid activity seed ${filePath}: ${where} ${issue?.message ?? "unknown error"}`.trim());
  }
  return parsed.data;
}
