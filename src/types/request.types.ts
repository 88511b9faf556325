import { Request } from 'express';
import { UserResponse } from '../connections/db/models/user.model';

/**
 * Request carrying the user resolved by the authenticate middleware
 */
export interface AuthRequest extends Request {
  user?: UserResponse;
}
