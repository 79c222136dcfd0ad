import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial schema migration — creates the account and staff tables.
 *
 * Tables: staff_members, users
 * Enums: user_role_enum
 *
 * Hand-written to match the TypeORM entity definitions, since
 * migration:generate requires a running database connection. The SQL is
 * PostgreSQL-specific (serial keys, timestamptz, CREATE TYPE).
 */
export class InitialSchema1760860800000 implements MigrationInterface {
  name = 'InitialSchema1760860800000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    // ── Create enum types ──────────────────────────────────
    await queryRunner.query(
      `CREATE TYPE "user_role_enum" AS ENUM ('user', 'admin')`,
    );

    // ── Staff members table ────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "staff_members" (
        "id"          SERIAL NOT NULL,
        "name"        varchar(255) NOT NULL,
        "position"    varchar(255) NOT NULL,
        "email"       varchar(255) NOT NULL,
        "photo_url"   varchar(1024),
        "created_at"  TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_staff_members" PRIMARY KEY ("id")
      )
    `);

    // ── Users table ────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "users" (
        "id"            SERIAL NOT NULL,
        "username"      varchar(50) NOT NULL,
        "email"         varchar(255) NOT NULL,
        "password_hash" varchar(255) NOT NULL,
        "role"          "user_role_enum" NOT NULL DEFAULT 'user',
        "is_active"     boolean NOT NULL DEFAULT true,
        "staff_id"      integer,
        "created_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_users" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_users_email" UNIQUE ("email"),
        CONSTRAINT "UQ_users_username" UNIQUE ("username"),
        CONSTRAINT "CHK_users_password_hash" CHECK ("password_hash" <> ''),
        CONSTRAINT "FK_users_staff" FOREIGN KEY ("staff_id")
          REFERENCES "staff_members"("id") ON DELETE SET NULL ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_users_email" ON "users" ("email")`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_users_username" ON "users" ("username")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    // ── Drop tables (reverse order of creation) ────────────
    await queryRunner.query(`DROP TABLE IF EXISTS "users"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "staff_members"`);

    // ── Drop enum types ────────────────────────────────────
    await queryRunner.query(`DROP TYPE IF EXISTS "user_role_enum"`);
  }
}
