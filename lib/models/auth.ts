import { z } from 'zod';

// Optional token fields treat null the same as absent
const optional = <T extends z.ZodTypeAny>(schema: T) =>
    schema.nullish().transform(value => value ?? undefined);

/**
 * Decoder for an OAuth-style token response
 */
export const authTokenSchema = z.object({
    access_token: z.string(),
    token_type: z.string(),
    expires_in: optional(z.number().int()),
    refresh_token: optional(z.string()),
    scope: optional(z.string()),
});

export type AuthToken = z.infer<typeof authTokenSchema>;
