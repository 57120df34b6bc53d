import { z } from 'zod';

export const confidenceSchema = z.enum(['high', 'medium', 'low']);
export const issueTypeSchema = z.enum(['cyber_attack', 'service_outage', 'security_incident', 'none']);
export const severitySchema = z.enum(['high', 'medium', 'low']);

export const findingSchema = z.object({
  // 1-based into the analyzed subset; only numbers and numeric strings count
  tweet_index: z
    .preprocess((v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v), z.number().int())
    .catch(0),
  company: z.string().catch(''),
  issue_type: z.string().catch(''), // free text, e.g. "DDoS", "app outage"
  severity: severitySchema.optional().catch(undefined),
  summary: z.string().catch(''),
});

/**
 * Model output is untrusted: every field falls back to a default instead of
 * failing the parse. Detail entries that are not objects are dropped; index
 * bounds are checked later, against the posts actually sent.
 */
export const analysisResultSchema = z.object({
  relevant: z.boolean().catch(false),
  confidence: confidenceSchema.optional().catch(undefined),
  issue_type: issueTypeSchema.optional().catch('none'),
  summary: z.string().catch(''),
  details: z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
      items.flatMap((item) => {
        const finding = findingSchema.safeParse(item);
        return finding.success ? [finding.data] : [];
      }),
    ),
});

export type Finding = z.infer<typeof findingSchema>;
export type AnalysisResult = z.infer<typeof analysisResultSchema>;

export function emptyAnalysis(): AnalysisResult {
  return { relevant: false, summary: '', details: [] };
}
