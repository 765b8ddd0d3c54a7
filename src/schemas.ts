import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

/** Overrides accepted by `configure()`; every key optional, unknown keys rejected. */
export const ConfigOverridesSchema = z
  .object({
    logging: z.object({ level: LogLevelSchema }).partial().strict(),
    scheduler: z
      .object({
        logSummary: z.boolean(),
        warnOnRootCleanup: z.boolean(),
      })
      .partial()
      .strict(),
    targets: z
      .object({
        tmpMarker: z.string().regex(/^[A-Za-z0-9_.]+$/, "marker must be a plain path fragment"),
        failedMarker: z.string().regex(/^[A-Za-z0-9_.]+$/, "marker must be a plain path fragment"),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;

export const BUNDLE_PREFIX = "__bundle.";

/** `{ "__bundle.<kind>": { ...fields } }` */
export const BundleEnvelopeSchema = z
  .record(z.string(), z.record(z.string(), z.unknown()))
  .refine((value) => {
    const keys = Object.keys(value);
    return keys.length === 1 && keys[0].startsWith(BUNDLE_PREFIX) && keys[0].length > BUNDLE_PREFIX.length;
  }, `expected a single "${BUNDLE_PREFIX}<kind>" key`);

export const ResourceCountsSchema = z.record(z.string().min(1), z.number().int().nonnegative());

/**
 * Parse `value` with `schema`, turning zod issues into one readable message
 * passed to `makeError`.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  makeError: (message: string, issues: z.ZodIssue[]) => Error,
): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  const message = result.error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
  throw makeError(message, result.error.issues);
}
