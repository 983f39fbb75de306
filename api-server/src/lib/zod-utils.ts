import { KeywardValidationError, validationError } from "keyward-core";
import { ZodError, ZodType } from "zod";

export function getErrorMessageFromZodParse(zError: ZodError) {
  const errors = zError.issues
    .map((issue) => `${issue.path.join(".") || "payload"} ${issue.message}`)
    .join(", ");
  return errors;
}

/** A missing body parses as `{}` so field errors name the field. */
export function parseBody<T>(
  schema: ZodType<T>,
  body: unknown,
): T | KeywardValidationError {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    return validationError(getErrorMessageFromZodParse(parsed.error));
  }
  return parsed.data;
}
