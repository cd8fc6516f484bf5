import { NextResponse } from "next/server";
import { ZodError } from "zod";
import { AccessError, ConfigError, errorMessage } from "@/lib/errors";
import type { Logger } from "@/lib/logger";

/** Map an error thrown inside a route handler onto a JSON response. */
export const errorResponse = (error: unknown, logger: Logger, fallback: string): NextResponse => {
  if (error instanceof ZodError) {
    return NextResponse.json({ error: error.issues[0]?.message ?? "Validation failed" }, { status: 400 });
  }

  if (error instanceof RangeError) {
    return NextResponse.json({ error: error.message }, { status: 400 });
  }

  if (error instanceof AccessError) {
    logger.warn({ err: error, code: error.code }, error.message);
    return NextResponse.json({ error: error.message, code: error.code }, { status: error.httpStatus });
  }

  if (error instanceof ConfigError) {
    logger.error({ err: error, variable: error.variable }, error.message);
    return NextResponse.json({ error: error.message, code: error.code }, { status: 500 });
  }

  logger.error({ err: error }, fallback);
  return NextResponse.json({ error: errorMessage(error, fallback) }, { status: 500 });
};
