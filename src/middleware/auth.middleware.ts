import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { jwtPayloadSchema, type JwtPayload } from '../types/auth.js';

// Extend Express Request type to include user
export interface AuthRequest extends Request {
  user?: JwtPayload;
}

/**
 * Verifies the bearer token issued by the auth service. Tokens are never
 * issued here.
 */
export const authenticate = (req: AuthRequest, res: Response, next: NextFunction) => {
  const authHeader = req.headers.authorization;
  const token = authHeader && authHeader.split(' ')[1]; // Bearer <token>

  if (!token) {
    return res.status(401).json({ success: false, error: 'Unauthorized: No token provided' });
  }

  const secret = process.env.JWT_SECRET;
  if (!secret) {
    return res.status(500).json({ success: false, error: 'Authentication is not configured' });
  }

  let decoded: unknown;
  try {
    decoded = jwt.verify(token, secret);
  } catch {
    return res.status(403).json({ success: false, error: 'Forbidden: Invalid or expired token' });
  }

  const payload = jwtPayloadSchema.safeParse(decoded);
  if (!payload.success) {
    return res.status(403).json({ success: false, error: 'Forbidden: Token payload is missing userId' });
  }

  req.user = payload.data;
  next();
};

export const requireAdmin = (req: AuthRequest, res: Response, next: NextFunction) => {
  if (req.user?.role !== 'admin') {
    return res.status(403).json({ success: false, error: 'Forbidden: Admin access required' });
  }
  next();
};
