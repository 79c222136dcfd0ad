import { Module, DynamicModule } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from './entities/user.entity';
import { StaffMember } from './entities/staff-member.entity';

/** All entity classes registered in this database library */
const ENTITIES = [User, StaffMember] as const;

/**
 * DatabaseModule — makes the `User` and `StaffMember` repositories
 * injectable in the feature module that imports `forFeature()`.
 */
@Module({})
export class DatabaseModule {
  /** Used by UsersModule and StaffModule. */
  static forFeature(): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [TypeOrmModule.forFeature([...ENTITIES])],
      exports: [TypeOrmModule],
    };
  }

  /** Entity list for the connection set up in AppModule. */
  static get entities(): ReadonlyArray<Function> {
    return ENTITIES;
  }
}
