import type { RequestHandler } from "express";
import { ZodError, type ZodTypeAny } from "zod";
import type { ApiErrorResponse } from "@taxograph/shared";

interface RequestSchemas {
  body?: ZodTypeAny;
  query?: ZodTypeAny;
  params?: ZodTypeAny;
}

type RequestPart = keyof RequestSchemas;

const PARTS: readonly RequestPart[] = ["params", "query", "body"];

/**
 * Parses each request part through its schema and replaces it with the parsed value,
 * so handlers read coerced numbers and defaults. The first failing part answers 400.
 */
export const validate = (schemas: RequestSchemas): RequestHandler => {
  return (req, res, next) => {
    try {
      for (const part of PARTS) {
        const schema = schemas[part];
        if (!schema) {
          continue;
        }
        if (part === "params") {
          req.params = schema.parse(req.params);
        } else if (part === "query") {
          req.query = schema.parse(req.query);
        } else {
          req.body = schema.parse(req.body);
        }
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const response: ApiErrorResponse = {
          error: "Validation failed",
          details: error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message
          }))
        };
        return res.status(400).json(response);
      }

      return next(error);
    }
  };
};
