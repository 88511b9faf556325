import { MigrationInfo } from './types';

// Import all migrations
import * as migration001 from './20250101_000001_create_roles_table';
import * as migration002 from './20250101_000002_create_users_table';
import * as migration003 from './20250101_000003_create_contacts_table';
import * as migration004 from './20250101_000004_create_emails_table';
import * as migration005 from './20250101_000005_create_phones_table';

export const migrations: MigrationInfo[] = [
  { name: '20250101_000001_create_roles_table', migration: migration001.migration },
  { name: '20250101_000002_create_users_table', migration: migration002.migration },
  { name: '20250101_000003_create_contacts_table', migration: migration003.migration },
  { name: '20250101_000004_create_emails_table', migration: migration004.migration },
  { name: '20250101_000005_create_phones_table', migration: migration005.migration },
];
