import { z } from 'zod';

const password = z.string().min(6, 'Password must be at least 6 characters');

export const registerSchema = z.object({
  username: z.string().trim().min(1, 'Username cannot be empty').regex(/^[^,:*?[\]\\]+$/, 'Username contains invalid characters'),
  email: z.string().trim().min(1, 'Email cannot be empty').email('Email is not valid'),
  password,
});

export const loginSchema = z.object({
  username: z.string().trim().min(1, 'Username cannot be empty'),
  password: z.string().min(1, 'Password cannot be empty'),
});

export const profileSchema = z.object({
  email: z.string().trim().min(1, 'Email cannot be empty').email('Email is not valid'),
  firstName: z.string().trim().default(''),
  lastName: z.string().trim().default(''),
});

export const passwordSchema = z.object({ password });

export const resetRequestSchema = z.object({
  email: z.string().trim().min(1, 'Email cannot be empty'),
});

export const tokenSchema = z.object({
  token: z.string().trim().min(1, 'Token cannot be empty'),
});
