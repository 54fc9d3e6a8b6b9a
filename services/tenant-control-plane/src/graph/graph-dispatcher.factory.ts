import { Inject, Injectable } from '@nestjs/common';
import type { Dispatcher } from 'undici';
import type { AuditSink } from '../audit';
import type { AccessTokenProvider } from '../auth/types';
import { type AppConfig, appConfig, type TenantConfig } from '../config';
import { GraphDispatcher } from './graph-dispatcher';
import { GRAPH_HTTP_DISPATCHER } from './graph.constants';
import { DEFAULT_RETRY_POLICY } from './retry-policy';
import { SLEEPER, type Sleeper } from './sleeper';

@Injectable()
export class GraphDispatcherFactory {
  public constructor(
    @Inject(appConfig.KEY) private readonly config: AppConfig,
    @Inject(GRAPH_HTTP_DISPATCHER) private readonly httpDispatcher: Dispatcher,
    @Inject(SLEEPER) private readonly sleep: Sleeper,
  ) {}

  public create(
    tenant: TenantConfig,
    tokenProvider: AccessTokenProvider,
    audit: AuditSink,
  ): GraphDispatcher {
    return new GraphDispatcher(tenant, tokenProvider, audit, {
      httpDispatcher: this.httpDispatcher,
      sleep: this.sleep,
      timeoutMs: this.config.graphRequestTimeoutMs,
      maxRetries: this.config.graphMaxRetries,
      retryPolicy: {
        ...DEFAULT_RETRY_POLICY,
        maxBackoffSeconds: this.config.graphMaxBackoffSeconds,
      },
    });
  }
}
