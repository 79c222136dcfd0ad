import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { StaffMember } from './staff-member.entity';
import { UserRole } from '../enums/user-role.enum';

/**
 * User entity — an account that can authenticate against the API.
 *
 * Invariants:
 * - Email and username are each unique across all users
 * - Email is stored lower-cased; lookups normalize the same way
 * - Password is stored as a bcrypt hash, never in plaintext, never empty
 * - Username is immutable after creation
 * - Deleting a linked staff member clears staff_id, the account stays
 */
@Entity('users')
export class User {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('IDX_users_username', { unique: true })
  @Column({ type: 'varchar', length: 50, unique: true, update: false })
  username!: string;

  @Index('IDX_users_email', { unique: true })
  @Column({ type: 'varchar', length: 255, unique: true })
  email!: string;

  @Column({ type: 'varchar', length: 255, name: 'password_hash' })
  passwordHash!: string;

  @Column({
    type: 'enum',
    enum: UserRole,
    enumName: 'user_role_enum',
    default: UserRole.USER,
  })
  role!: UserRole;

  @Column({ type: 'boolean', name: 'is_active', default: true })
  isActive!: boolean;

  @Column({ type: 'int', name: 'staff_id', nullable: true })
  staffId!: number | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => StaffMember, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'staff_id' })
  staff?: StaffMember | null;
}
