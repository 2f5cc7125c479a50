import { Principal } from '../principal';

/**
 * Core entity representing a self-registered identity.
 * `name` and `email` are write-once; only verification mutates the record.
 */
export interface Identity {
  owner: Principal;
  name: string;
  email: string;
  createdAt: number;
  isVerified: boolean;
  /** Reserved extension point, not populated by any operation yet. */
  attributes: Record<string, string>;
  verifiers: Principal[];
}
