/**
 * @exposure/sdk — Wire schemas.
 *
 * The disclosure server speaks plain JSON with its own field names
 * (`reportID`, `reportTimeStamp`); these are mapped to the domain types at
 * the client boundary.
 */

import { z } from "zod";

export const CenKeysResponseSchema = z.array(z.string());

export const CenReportSchema = z.object({
  reportID: z.string().min(1),
  /** Base64-encoded report text */
  report: z.string(),
  reportTimeStamp: z.number().int().nonnegative(),
});

export const CenReportsResponseSchema = z.array(CenReportSchema);

export type CenReport = z.infer<typeof CenReportSchema>;

/** Body of `POST /cenreport`. */
export interface CenReportSubmission {
  readonly reportID: string;
  readonly report: string;
  /** Comma-separated key values */
  readonly cenKeys: string;
  readonly reportTimeStamp: number;
}
