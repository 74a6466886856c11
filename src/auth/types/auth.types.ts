import { Request } from 'express';
import { z } from 'zod';
import { User } from '../../database/schema';

export const registerSchema = z.object({
  email: z.string().email(),
  username: z.string().min(3).max(50),
  password: z.string().min(8),
  full_name: z.string().max(200).optional(),
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const loginSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export const apiKeyCreateSchema = z.object({
  name: z.string().min(1).max(100),
});

export interface PublicUser {
  id: number;
  email: string;
  username: string;
  full_name: string | null;
  role: 'admin' | 'user';
  is_active: boolean;
  created_at: string;
}

export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
  expires_in: number;
}

export interface CreatedApiKey {
  id: number;
  name: string;
  prefix: string;
  /** Only returned once, at creation. */
  key: string;
}

export interface AuthenticatedRequest extends Request {
  user?: User;
}
