/**
 * Global error handler.
 *
 * Registered as Hono's onError handler. Every failure leaves as a
 * text/plain body holding one of the fixed public messages; node error
 * text and stack traces go to the request's logger only.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError, INTERNAL_ERROR } from "../types/error.js";

export function createErrorHandler(): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    if (err instanceof ApiError) {
      if (err.status >= 500) {
        c.get("logger").error({ err, code: err.code }, "Lookup failed");
      }
      return c.text(err.message, err.status);
    }

    c.get("logger").error({ err }, "Unhandled error");
    return c.text(INTERNAL_ERROR, 500);
  };
}
