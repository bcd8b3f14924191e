import { Global, Module } from '@nestjs/common';
import { EnvironmentVariables, ledgerPolicyFromEnvironment, validateEnvironment } from './environment';
import { LEDGER_POLICY } from './ledger-policy';

export const ENVIRONMENT = Symbol('ENVIRONMENT');

@Global()
@Module({
  providers: [
    { provide: ENVIRONMENT, useFactory: () => validateEnvironment(process.env) },
    {
      provide: LEDGER_POLICY,
      useFactory: (env: EnvironmentVariables) => ledgerPolicyFromEnvironment(env),
      inject: [ENVIRONMENT],
    },
  ],
  exports: [ENVIRONMENT, LEDGER_POLICY],
})
export class LedgerConfigModule {}
