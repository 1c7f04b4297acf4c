import { z } from 'zod';

export const jwtPayloadSchema = z.object({
  userId: z.string().min(1),
  role: z.enum(['user', 'admin']).optional()
});

export type JwtPayload = z.infer<typeof jwtPayloadSchema>;
