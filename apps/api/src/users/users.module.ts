import { Module } from '@nestjs/common';
import { DatabaseModule } from '@warden/database';
import { TypeOrmUserStore } from './typeorm-user-store';
import { USER_STORE } from './user-store';
import { UsersService } from './users.service';
import { UsersController } from './users.controller';

/**
 * UsersModule — owns the credential store adapter and account
 * administration.
 *
 * Exports USER_STORE so AuthModule can look accounts up without depending
 * on TypeORM directly.
 */
@Module({
  imports: [DatabaseModule.forFeature()],
  controllers: [UsersController],
  providers: [
    UsersService,
    { provide: USER_STORE, useClass: TypeOrmUserStore },
  ],
  exports: [USER_STORE, UsersService],
})
export class UsersModule {}
