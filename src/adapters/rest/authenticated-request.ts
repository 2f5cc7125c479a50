import type { Request } from 'express';

export interface AuthenticatedRequest extends Request {
  /** Checksummed address recovered from the request signature */
  principal?: string;
}
