import { Inject, Module, type OnApplicationShutdown } from '@nestjs/common';
import { Agent, type Dispatcher } from 'undici';
import { GraphDispatcherFactory } from './graph-dispatcher.factory';
import { GRAPH_HTTP_DISPATCHER } from './graph.constants';
import { defaultSleeper, SLEEPER } from './sleeper';

@Module({
  providers: [
    {
      provide: GRAPH_HTTP_DISPATCHER,
      useFactory: () =>
        new Agent({
          connectTimeout: 15_000,
          keepAliveTimeout: 30_000,
        }),
    },
    { provide: SLEEPER, useValue: defaultSleeper },
    GraphDispatcherFactory,
  ],
  exports: [GraphDispatcherFactory],
})
export class GraphModule implements OnApplicationShutdown {
  public constructor(
    @Inject(GRAPH_HTTP_DISPATCHER) private readonly httpDispatcher: Dispatcher,
  ) {}

  public async onApplicationShutdown(): Promise<void> {
    await this.httpDispatcher.close();
  }
}
