import type { IncomingMessage } from 'node:http';
import { defaultLoggerOptions, defaultPinoHttpOptions } from '@control-plane/logger';
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_PIPE } from '@nestjs/core';
import { LoggerModule } from 'nestjs-pino';
import { ZodValidationPipe } from 'nestjs-zod';
import { AuditModule } from './audit';
import { type AppConfig, appConfig } from './config';
import { ControlPlaneErrorFilter } from './filters/control-plane-error.filter';
import { ProbeController } from './probe/probe.controller';
import { CORRELATION_ID_HEADER, resolveCorrelationId } from './tenant/correlation-id';
import { TenantModule } from './tenant/tenant.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      ignoreEnvFile: true,
      load: [appConfig],
    }),
    LoggerModule.forRootAsync({
      useFactory(appConfigValue: AppConfig) {
        return {
          ...defaultLoggerOptions,
          pinoHttp: {
            ...defaultPinoHttpOptions,
            level: appConfigValue.logLevel,
            genReqId: (req: IncomingMessage) => resolveCorrelationId(req.headers[CORRELATION_ID_HEADER]),
          },
        };
      },
      inject: [appConfig.KEY],
    }),
    AuditModule,
    TenantModule,
  ],
  controllers: [ProbeController],
  providers: [
    { provide: APP_PIPE, useClass: ZodValidationPipe },
    { provide: APP_FILTER, useClass: ControlPlaneErrorFilter },
  ],
})
export class AppModule {}
