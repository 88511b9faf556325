// Role Model - Based on migration 20250101_000001_create_roles_table

import { RoleName } from '../../../constants/user.constants';

export interface Role {
  id: number;
  name: RoleName;
}
