import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { User } from '@warden/database';
import {
  NewUser,
  UserChanges,
  UnknownStaffMemberError,
  UserConflictError,
  UserStore,
} from './user-store';

/** PostgreSQL SQLSTATEs */
const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

/**
 * UserStore backed by the TypeORM `users` repository.
 */
@Injectable()
export class TypeOrmUserStore implements UserStore {
  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  findByEmail(email: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { email } });
  }

  findByUsername(username: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { username } });
  }

  findById(id: number): Promise<User | null> {
    return this.userRepository.findOne({ where: { id } });
  }

  list(): Promise<User[]> {
    return this.userRepository.find({ order: { id: 'ASC' } });
  }

  async create(data: NewUser): Promise<User> {
    const user = this.userRepository.create(data);

    try {
      return await this.userRepository.save(user);
    } catch (error) {
      throw toConflictError(error) ?? error;
    }
  }

  async update(id: number, changes: UserChanges): Promise<User | null> {
    const user = await this.findById(id);
    if (!user) {
      return null;
    }

    try {
      return await this.userRepository.save(
        this.userRepository.merge(user, changes),
      );
    } catch (error) {
      if (sqlState(error) === FOREIGN_KEY_VIOLATION) {
        throw new UnknownStaffMemberError(changes.staffId ?? null);
      }
      throw error;
    }
  }
}

/** SQLSTATE of a failed query, if the driver reported one. */
function sqlState(error: unknown): string | null {
  if (!(error instanceof QueryFailedError)) {
    return null;
  }

  const driverError: unknown = error.driverError;
  if (
    typeof driverError !== 'object' ||
    driverError === null ||
    !('code' in driverError) ||
    typeof driverError.code !== 'string'
  ) {
    return null;
  }
  return driverError.code;
}

/**
 * Translate a unique-constraint failure into a UserConflictError, naming the
 * column from the violated constraint.
 */
function toConflictError(error: unknown): UserConflictError | null {
  if (!(error instanceof QueryFailedError) || sqlState(error) !== UNIQUE_VIOLATION) {
    return null;
  }

  const driverError: unknown = error.driverError;
  const constraint =
    typeof driverError === 'object' &&
    driverError !== null &&
    'constraint' in driverError &&
    typeof driverError.constraint === 'string'
      ? driverError.constraint
      : '';

  return new UserConflictError(
    constraint.includes('username') ? 'username' : 'email',
  );
}
