import { CoordinatorError, NotFoundError, formatError } from "../../errors.js";
import { ErrorCodes, errorShape, type ErrorShape } from "../protocol/index.js";

export function readString(params: Record<string, unknown>, key: string): string | undefined {
  const val = params[key];
  return typeof val === "string" ? val.trim() : undefined;
}

export function readNumber(params: Record<string, unknown>, key: string): number | undefined {
  const val = params[key];
  return typeof val === "number" ? val : undefined;
}

/** Coordinator errors keep their message; anything else is reported as unavailable. */
export function toErrorShape(err: unknown): ErrorShape {
  if (err instanceof NotFoundError) {
    return errorShape(ErrorCodes.NOT_FOUND, err.message, { code: err.code, ...err.details });
  }
  if (err instanceof CoordinatorError) {
    return errorShape(ErrorCodes.INVALID_REQUEST, err.message, { code: err.code, ...err.details });
  }
  return errorShape(ErrorCodes.UNAVAILABLE, formatError(err));
}
