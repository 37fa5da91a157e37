import { Response } from "express";
import { ZodError } from "zod";
import { Page } from "../models/types";
import { idParamSchema, pageSchema } from "../models/schemas";

export const sendValidationError = (res: Response, error: ZodError) =>
  res.status(400).json({
    error: "Validation failed",
    details: error.flatten().fieldErrors,
  });

/** Positive integer route id, or null. */
export const parseId = (value: unknown): number | null => {
  const parsed = idParamSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
};

export const parsePage = (
  queryParams: unknown,
): { page: Page } | { error: ZodError } => {
  const parsed = pageSchema.safeParse(queryParams);
  return parsed.success ? { page: parsed.data } : { error: parsed.error };
};
