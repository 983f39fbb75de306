import { z } from "zod";

// Shapes only. Email format and password length are the account service's call.
export const credentialsBodySchema = z.object({
  email: z.string(),
  password: z.string(),
});

export const tokenBodySchema = z.object({ token: z.string().min(1) });

export const emailBodySchema = z.object({ email: z.string() });

export const passwordResetBodySchema = z.object({
  token: z.string().min(1),
  password: z.string(),
});
