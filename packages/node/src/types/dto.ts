/**
 * Request DTOs with Zod validation schemas.
 */

import { z } from "zod";
import { isIdentifierHex } from "@exposure/types";

export const ObservationSchema = z.object({
  identifier: z
    .string()
    .refine(isIdentifierHex, "identifier must be 32 lower-case hex characters"),
  observedAt: z.number().int().nonnegative(),
});

export type ObservationDto = z.infer<typeof ObservationSchema>;

export const SendReportSchema = z.object({
  description: z.string().min(1).max(4096),
});

export type SendReportDto = z.infer<typeof SendReportSchema>;
