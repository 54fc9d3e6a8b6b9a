export { GraphDispatcher, type GraphDispatcherOptions } from './graph-dispatcher';
export { GraphDispatcherFactory } from './graph-dispatcher.factory';
export { GRAPH_HTTP_DISPATCHER } from './graph.constants';
export { GraphModule } from './graph.module';
export type { GraphRequestOptions, GraphResponse, HttpMethod } from './graph.types';
export { DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry-policy';
export { defaultSleeper, SLEEPER, type Sleeper } from './sleeper';
