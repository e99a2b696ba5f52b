/**
 * Security tool parameter schemas
 */

import { z } from 'zod';

export const userSchema = z.object({
  user_name: z.string().default('').describe('User name'),
});

export const roleSchema = z.object({
  role_name: z.string().default('').describe('Role name'),
});

export type UserParams = z.infer<typeof userSchema>;
export type RoleParams = z.infer<typeof roleSchema>;
