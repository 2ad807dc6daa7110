import { ZodError } from "zod";
import type { z } from "zod";
import { FsError } from "../../core/src/index";
import { logger as defaultLogger } from "./logger";
import type { EngineLogger } from "./logger";

export const formatValidationError = (error: ZodError): string => {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.map(String).join(".") : "payload";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
};

/** Parse caller input; a schema violation becomes an InvalidOperation error. */
export const parsePayload = <S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  actionLabel: string,
  logger: EngineLogger = defaultLogger
): z.infer<S> => {
  try {
    return schema.parse(payload);
  } catch (error) {
    if (error instanceof ZodError) {
      logger.error(`[Validation] ${actionLabel}`, { issues: formatValidationError(error) });
      throw FsError.invalidOperation(`Invalid ${actionLabel}: ${formatValidationError(error)}`);
    }

    throw error;
  }
};
