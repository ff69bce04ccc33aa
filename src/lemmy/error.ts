import { z } from 'zod';

/**
 * Error kind declared by the Lemmy API, e.g. `incorrect_login` or `not_logged_in`.
 *
 * The set of kinds belongs to the server release, so it is kept open.
 */
export type LemmyErrorType = string;

/**
 * Shape of an error body, `{"error": "incorrect_login"}` with an optional `message`
 * for the kinds that carry one.
 */
export const lemmyErrorResponseSchema = z.object({
  error: z.string().min(1),
  message: z.string().nullish(),
});

/** Decoded error body. */
export type LemmyErrorResponse = z.infer<typeof lemmyErrorResponseSchema>;
