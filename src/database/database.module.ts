// src/database/database.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { StructuredLoggerService } from '../common/logging/structured-logger.service';
import { ENVIRONMENT } from '../config/config.module';
import { EnvironmentVariables } from '../config/environment';
import { AuditContextService } from '../modules/audit/audit-context.service';
import { LEDGER_ENTITIES } from './entities';
import { TypeOrmQueryLogger } from './typeorm-query.logger';

export function buildTypeOrmOptions(
  env: EnvironmentVariables,
  logger?: TypeOrmQueryLogger,
): TypeOrmModuleOptions {
  const common = {
    entities: LEDGER_ENTITIES,
    synchronize: env.DB_SYNCHRONIZE,
    logging: env.DB_LOGGING,
    logger: env.DB_LOGGING ? logger : undefined,
  };

  if (env.DB_TYPE === 'better-sqlite3') {
    return { ...common, type: 'better-sqlite3', database: env.DB_DATABASE };
  }
  return { ...common, type: 'postgres', url: env.DATABASE_URL };
}

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ENVIRONMENT, StructuredLoggerService, AuditContextService],
      useFactory: (
        env: EnvironmentVariables,
        structuredLogger: StructuredLoggerService,
        context: AuditContextService,
      ) => buildTypeOrmOptions(env, new TypeOrmQueryLogger(structuredLogger, context)),
    }),
  ],
})
export class DatabaseModule {}
