import { NextFunction, Request, RequestHandler, Response } from "express";
import { ZodError, ZodTypeAny, z } from "zod";
import { ValidationError } from "../utils/errors";

type ValidatedHandler<T> = (
  input: T,
  req: Request,
  res: Response
) => Promise<unknown>;

export const formatZodError = (error: ZodError): string =>
  error.errors
    .map((e) => (e.path.length > 0 ? `${e.path.join(".")}: ${e.message}` : e.message))
    .join(", ");

const validate =
  <S extends ZodTypeAny>(
    schema: S,
    pick: (req: Request) => unknown,
    handler: ValidatedHandler<z.output<S>>
  ): RequestHandler =>
  async (req: Request, res: Response, next: NextFunction) => {
    const parsed = schema.safeParse(pick(req));
    if (!parsed.success) {
      return next(new ValidationError(formatZodError(parsed.error)));
    }

    try {
      await handler(parsed.data, req, res);
    } catch (error) {
      next(error);
    }
  };

/** Parse `req.body` before the handler runs; failures become 400s. */
export const validateBody = <S extends ZodTypeAny>(
  schema: S,
  handler: ValidatedHandler<z.output<S>>
) => validate(schema, (req) => req.body, handler);

/** Parse `req.query` before the handler runs; failures become 400s. */
export const validateQuery = <S extends ZodTypeAny>(
  schema: S,
  handler: ValidatedHandler<z.output<S>>
) => validate(schema, (req) => req.query, handler);
