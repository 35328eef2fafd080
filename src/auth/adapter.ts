import { Request } from 'express';
import { AuthContext } from './types';

export interface AuthAdapter {
  /**
   * `undefined` when the request carries no credential at all; throws when it carries
   * one that does not resolve.
   */
  resolve(req: Request): Promise<AuthContext | undefined>;
}
