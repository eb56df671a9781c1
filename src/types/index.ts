// Wire types of the QCS token endpoint

import { z } from 'zod';

export interface LoginCredentials {
  username: string;
  password: string;
}

export const tokenResponseSchema = z
  .object({
    token: z.string().min(1),
  })
  .passthrough();

export type TokenResponse = z.infer<typeof tokenResponseSchema>;
