import { z } from "zod";
import { RecordValidationError } from "./errors";
import type { RawCandidate, ReviewRecord } from "./types";

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RecordValidationError };

const score = z.number().min(0).max(5).nullable();

const candidateSchema = z.object({
  hotelId: z.string().trim().min(1, "hotel id is required"),
  name: z.string().trim().min(1, "name is required").max(200),
  address: z.string().nullable(),
  latitude: z.number().min(-90).max(90).nullable(),
  longitude: z.number().min(-180).max(180).nullable(),
  starLevel: z.string().nullable(),
  ratingScore: score,
  reviewCount: z.number().int().nonnegative().nullable(),
  basePrice: z.number().nonnegative().nullable(),
});

export type ValidCandidate = z.infer<typeof candidateSchema>;

const reviewSchema = z.object({
  reviewId: z.string().min(1),
  hotelId: z.string().min(1, "parent hotel id is required"),
  authorHandle: z.string().max(100).nullable(),
  content: z.string().trim().min(1, "content is required"),
  summary: z.string().max(500).nullable(),
  scores: z.object({
    clean: score,
    location: score,
    service: score,
    value: score,
  }),
});

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
  );
}

export function validateCandidate(
  raw: RawCandidate,
): ValidationResult<ValidCandidate> {
  const result = candidateSchema.safeParse(raw);
  if (!result.success) {
    return {
      ok: false,
      error: new RecordValidationError(
        `candidate ${raw.hotelId ?? "(no id)"}`,
        describeIssues(result.error),
      ),
    };
  }
  return { ok: true, value: result.data };
}

export function validateReview(
  record: ReviewRecord,
): ValidationResult<ReviewRecord> {
  const result = reviewSchema.safeParse(record);
  if (!result.success) {
    return {
      ok: false,
      error: new RecordValidationError(
        `review ${record.reviewId}`,
        describeIssues(result.error),
      ),
    };
  }
  return { ok: true, value: record };
}
