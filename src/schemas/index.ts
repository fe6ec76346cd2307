import { z } from "zod";
import { DEFAULT_LIMIT, DEFAULT_PAGE, MAX_LIMIT } from "../config";
import { ErrorCode, ServiceError } from "../services/errors";

// Role, city and product type stay plain strings here: the services reject bad values with their own error codes.

export const dummyLoginSchema = z.object({
  role: z.string()
});

export const registerSchema = z.object({
  email: z.string().min(1),
  password: z.string().min(1),
  role: z.string()
});

export const loginSchema = z.object({
  email: z.string(),
  password: z.string()
});

export const createPickupPointSchema = z.object({
  city: z.string()
});

export const createReceptionSchema = z.object({
  pvzId: z.string().min(1)
});

export const addProductSchema = z.object({
  type: z.string(),
  pvzId: z.string().min(1)
});

// An empty bound counts as absent.
const dateBound = z.preprocess(value => (value === "" ? undefined : value), z.string().optional());

// Dates are only parsed when both bounds are given; a lone bound is ignored.
export const listPickupPointsSchema = z
  .object({
    startDate: dateBound,
    endDate: dateBound,
    page: z.coerce.number().int().min(1).default(DEFAULT_PAGE),
    limit: z.coerce.number().int().min(1).max(MAX_LIMIT).default(DEFAULT_LIMIT)
  })
  .transform(({ startDate, endDate, page, limit }, ctx) => {
    if (startDate === undefined || endDate === undefined) {
      return { page, limit };
    }
    const start = new Date(startDate);
    const end = new Date(endDate);
    if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "startDate and endDate must be ISO-8601 dates" });
      return z.NEVER;
    }
    return { page, limit, startDate: start, endDate: end };
  });

export function parse<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const message = result.error.issues
      .map(issue => `${issue.path.join(".") || "request"}: ${issue.message}`)
      .join("; ");
    throw new ServiceError(ErrorCode.VALIDATION_ERROR, message);
  }
  return result.data;
}
