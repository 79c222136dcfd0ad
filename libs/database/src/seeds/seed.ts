import { Logger } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import AppDataSource from '../data-source';
import { User } from '../entities/user.entity';
import { StaffMember } from '../entities/staff-member.entity';
import { UserRole } from '../enums/user-role.enum';

/**
 * Seed script — populates the database with demo accounts and staff.
 *
 * Usage:
 *   npm run build && npm run seed
 *
 * Prerequisites:
 *   - PostgreSQL is running
 *   - Migrations have been applied (npm run migration:run)
 *
 * Idempotent: truncates both tables before inserting. Every demo account
 * gets the password from SEED_PASSWORD (default "change-me-now").
 */

const SEED_SALT_ROUNDS = 10;

interface SeedUser {
  username: string;
  email: string;
  role: UserRole;
  isActive: boolean;
  /** Index into STAFF, or null for accounts without a staff entry */
  staffIndex: number | null;
}

interface SeedStaff {
  name: string;
  position: string;
  email: string;
  photoUrl: string | null;
}

const STAFF: SeedStaff[] = [
  {
    name: 'Alice Johnson',
    position: 'Head of Operations',
    email: 'alice@warden.test',
    photoUrl: '/images/staff/alice.jpg',
  },
  {
    name: 'Bob Smith',
    position: 'Support Engineer',
    email: 'bob@warden.test',
    photoUrl: null,
  },
];

const USERS: SeedUser[] = [
  {
    username: 'alice',
    email: 'alice@warden.test',
    role: UserRole.ADMIN,
    isActive: true,
    staffIndex: 0,
  },
  {
    username: 'bob',
    email: 'bob@warden.test',
    role: UserRole.USER,
    isActive: true,
    staffIndex: 1,
  },
  {
    username: 'charlie',
    email: 'charlie@warden.test',
    role: UserRole.USER,
    isActive: false,
    staffIndex: null,
  },
];

async function seed(): Promise<void> {
  const logger = new Logger('Seed');
  const password = process.env['SEED_PASSWORD'] || 'change-me-now';

  logger.log('Initializing data source...');
  await AppDataSource.initialize();

  const queryRunner = AppDataSource.createQueryRunner();
  await queryRunner.connect();
  await queryRunner.startTransaction();

  try {
    logger.log('Truncating tables...');
    await queryRunner.query(
      'TRUNCATE TABLE users, staff_members RESTART IDENTITY CASCADE',
    );

    // ── Insert Staff ───────────────────────────────────────
    const staffRepo = queryRunner.manager.getRepository(StaffMember);
    const savedStaff = await staffRepo.save(
      STAFF.map((s) => staffRepo.create(s)),
    );
    logger.log(`✓ Inserted ${savedStaff.length} staff members`);

    // ── Insert Users ───────────────────────────────────────
    const passwordHash = await bcrypt.hash(password, SEED_SALT_ROUNDS);
    const userRepo = queryRunner.manager.getRepository(User);
    const savedUsers = await userRepo.save(
      USERS.map(({ staffIndex, ...u }) =>
        userRepo.create({
          ...u,
          passwordHash,
          staffId: staffIndex === null ? null : savedStaff[staffIndex].id,
        }),
      ),
    );
    logger.log(`✓ Inserted ${savedUsers.length} users`);

    await queryRunner.commitTransaction();
    logger.log('─────────────────────────────────────────');
    logger.log('✅ Seed completed successfully!');
    logger.log(`   Staff:  ${savedStaff.length}`);
    logger.log(`   Users:  ${savedUsers.length}`);
  } catch (error) {
    logger.error('Seed failed, rolling back transaction...');
    await queryRunner.rollbackTransaction();
    throw error;
  } finally {
    await queryRunner.release();
    await AppDataSource.destroy();
  }
}

seed().catch((error: Error) => {
  // eslint-disable-next-line no-console
  console.error('Fatal seed error:', error.message);
  process.exit(1);
});
