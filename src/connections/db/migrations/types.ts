import { SqlClient } from '../transaction';

export interface Migration {
  up(client: SqlClient): Promise<void>;
  down(client: SqlClient): Promise<void>;
}

export interface MigrationInfo {
  name: string;
  migration: Migration;
}
