import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import configuration from './configuration';

/**
 * Environment comes from the process and an optional `.env` in the working
 * directory. Validation runs inside `configuration`, so a bad value fails
 * context creation before any request is sent.
 */
@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      ignoreEnvFile: process.env.NODE_ENV === 'test',
      load: [configuration],
      cache: true,
      expandVariables: true,
    }),
  ],
})
export class ConfigModule {}
