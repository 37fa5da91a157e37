import { z } from "zod";

export const UserRoleSchema = z.enum(["buyer", "seller"]);

export const userCreateSchema = z.object({
  username: z.string().trim().min(1).max(50),
  email: z.string().trim().email().max(120),
  password: z.string().min(8),
  role: UserRoleSchema.default("buyer"),
});
export type UserCreate = z.infer<typeof userCreateSchema>;

// Accepts the OAuth2 password form too, where the email travels as `username`
export const loginSchema = z
  .object({
    email: z.string().trim().min(1).optional(),
    username: z.string().trim().min(1).optional(),
    password: z.string().min(1),
  })
  .transform((body, ctx) => {
    const email = body.email ?? body.username;
    if (!email) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "email is required",
        path: ["email"],
      });
      return z.NEVER;
    }
    return { email, password: body.password };
  });
export type LoginRequest = z.infer<typeof loginSchema>;

export const refreshTokenRequestSchema = z.object({
  refresh_token: z.string().min(1),
});

// Postgres INTEGER columns
const PG_INT_MAX = 2147483647;
const rowId = z.number().int().positive().max(PG_INT_MAX);
const count = z.number().int().min(0).max(PG_INT_MAX);

// numeric(10, 2)
const price = z.number().positive().max(99999999.99).multipleOf(0.01);

export const productCreateSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().max(500).nullable().default(null),
  price,
  image_url: z.string().max(200).nullable().default(null),
  stock: count,
  category_id: rowId,
});
export type ProductCreate = z.infer<typeof productCreateSchema>;

// seller_id is not updatable; unknown keys are rejected
export const productUpdateSchema = z
  .object({
    name: z.string().trim().min(1).max(100),
    description: z.string().max(500).nullable(),
    price,
    image_url: z.string().max(200).nullable(),
    stock: count,
    is_active: z.boolean(),
    category_id: rowId,
  })
  .partial()
  .strict();
export type ProductUpdate = z.infer<typeof productUpdateSchema>;

export const idParamSchema = z.coerce.number().pipe(rowId);

export const pageSchema = z.object({
  offset: z.coerce.number().pipe(count).default(0),
  limit: z.coerce.number().pipe(rowId).default(100),
});
