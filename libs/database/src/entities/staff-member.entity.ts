import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
} from 'typeorm';

/**
 * StaffMember entity — an entry in the public staff directory.
 *
 * A user account may link to one staff member (users.staff_id), but staff
 * entries exist independently of accounts.
 */
@Entity('staff_members')
export class StaffMember {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 255 })
  position!: string;

  @Column({ type: 'varchar', length: 255 })
  email!: string;

  @Column({ type: 'varchar', length: 1024, name: 'photo_url', nullable: true })
  photoUrl!: string | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;
}
