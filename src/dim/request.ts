/**
 * @file Dim Request Validation
 *
 * Zod schemas for the caller-facing arguments of `present()` and `dismiss()`.
 * Out-of-range values are a caller contract violation and are rejected here,
 * before the dimmer touches any state.
 *
 * @module dim/request
 */

import { z } from 'zod';

const DurationSchema = z
    .number()
    .finite('durationMs must be finite')
    .int('durationMs must be an integer')
    .nonnegative('durationMs must be >= 0');

export const PresentRequestSchema = z.object({
    layer:       z.number().int('layer must be an integer'),
    targetAlpha: z.number()
        .finite('targetAlpha must be finite')
        .min(0, 'targetAlpha must be within [0, 1]')
        .max(1, 'targetAlpha must be within [0, 1]'),
    durationMs:  DurationSchema,
});

export const DismissRequestSchema = z.object({
    durationMs: DurationSchema,
});

export type PresentRequest = z.infer<typeof PresentRequestSchema>;
export type DismissRequest = z.infer<typeof DismissRequestSchema>;

/**
 * Validate `present()` arguments.
 *
 * @throws On any out-of-contract argument, listing every issue.
 */
export function presentRequest_validate(layer: number, targetAlpha: number, durationMs: number): PresentRequest {
    const result = PresentRequestSchema.safeParse({ layer, targetAlpha, durationMs });
    if (!result.success) {
        throw new Error(`Invalid dim request: ${issues_join(result.error.issues)}`);
    }
    return result.data;
}

/**
 * Validate `dismiss()` arguments.
 *
 * @throws On a negative or non-finite duration.
 */
export function dismissRequest_validate(durationMs: number): DismissRequest {
    const result = DismissRequestSchema.safeParse({ durationMs });
    if (!result.success) {
        throw new Error(`Invalid dim request: ${issues_join(result.error.issues)}`);
    }
    return result.data;
}

function issues_join(issues: z.ZodIssue[]): string {
    return issues.map(i => `[${i.path.join('.')}] ${i.message}`).join('; ');
}
