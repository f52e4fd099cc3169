import { z } from "zod";

/**
 * Validate raw tool arguments, throwing one readable error that lists every problem.
 */
export function parseArgs<T extends z.ZodTypeAny>(toolName: string, schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid arguments for ${toolName}: ${problems}`);
  }
  return parsed.data;
}

export const limitArg = z.number().finite().optional();
export const requiredText = z.string().min(1);
export const eventTypeArg = z.enum(["auto", "all_day", "timed"]).optional();
