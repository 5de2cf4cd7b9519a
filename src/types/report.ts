/**
 * Backend report schema
 * The backend returns one object per check; only SOA is always present
 */

import { z } from "zod";

export const ReportSectionSchema = z
  .object({
    error: z.string().optional(),
  })
  .passthrough();

export const DomainReportSchema = z
  .object({
    soa: ReportSectionSchema,
  })
  .catchall(z.unknown());

export type ReportSection = z.infer<typeof ReportSectionSchema>;
export type DomainReport = z.infer<typeof DomainReportSchema>;
