import { z, ZodTypeAny } from "zod";
import { isDateKey } from "./dates";

// Accept YYYY-MM-DD dates only.
export const dateString = z.string().refine(isDateKey, "Invalid date format");

// Standardize Zod parsing results for route handlers.
export const parseWithSchema = <S extends ZodTypeAny>(schema: S, data: unknown):
  | { ok: true; data: z.infer<S> }
  | { ok: false; error: string } => {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.message };
  }
  return { ok: true, data: parsed.data };
};
