import { z } from "zod";
import { ValidationError } from "../errors.js";
import type { SubmissionInput } from "../jobs/validateSubmission.js";

export const analyzeRequestSchema = z.object({
    repos: z.array(z.string().trim().min(1, "repository URL must not be empty")),
    language: z.string().trim().min(1),
    threshold: z.number().optional(),
    branch: z.string().trim().min(1).optional(),
    aggressive: z.boolean().optional(),
});

export type AnalyzeRequestBody = z.infer<typeof analyzeRequestSchema>;

export const jobIdParamsSchema = z.object({
    id: z.string().uuid(),
});

/**
 * Shape check only; repository count, duplicates, threshold range and
 * language are checked by validateSubmission.
 */
export function parseAnalyzeRequest(body: unknown): SubmissionInput {
    const parsed = analyzeRequestSchema.safeParse(body);
    if (!parsed.success) {
        throw new ValidationError(
            parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
        );
    }
    return parsed.data;
}
