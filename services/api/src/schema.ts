import { z } from "zod";

export const activitySchema = z.object({
  description: z.string(),
  schedule: z.string(),
  max_participants: z.number().int().min(0),
  participants: z
    .array(z.string().min(1))
    .refine((emails) => new Set(emails).size === emails.length, { message: "duplicate participant" })
});

export const registrySchema = z.record(activitySchema);

export const membershipQuerySchema = z.object({
  email: z.string().trim().min(1)
});
