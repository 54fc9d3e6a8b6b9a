import type { GraphDispatcher } from '../graph';

export interface ExecutionContext {
  readonly tenantId: string;
  readonly correlationId: string;
  readonly dispatcher: GraphDispatcher;
}
