import { config } from 'dotenv';
import { DataSource, DataSourceOptions } from 'typeorm';
import { join } from 'path';

import { User } from './entities/user.entity';
import { StaffMember } from './entities/staff-member.entity';

/**
 * Load env vars from the project root .env file.
 * Supports running from source (libs/database/src) and from dist.
 */
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../../../.env') });

/**
 * TypeORM DataSource configuration for CLI-driven migrations.
 *
 * This file is used by:
 * - `typeorm migration:run` — applies pending migrations
 * - `typeorm migration:revert` — reverts the last applied migration
 * - the seed script
 *
 * Database credentials come from environment variables with dev defaults.
 * In production, these MUST be overridden.
 */
const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env['POSTGRES_HOST'] || 'localhost',
  port: parseInt(process.env['POSTGRES_PORT'] || '5432', 10),
  username: process.env['POSTGRES_USER'] || 'warden',
  password: process.env['POSTGRES_PASSWORD'] || 'warden_secret',
  database: process.env['POSTGRES_DB'] || 'warden',
  entities: [User, StaffMember],
  migrations: [join(__dirname, 'migrations', '*{.ts,.js}')],
  synchronize: false,
  logging: process.env['NODE_ENV'] !== 'production',
};

const AppDataSource = new DataSource(dataSourceOptions);

export default AppDataSource;
