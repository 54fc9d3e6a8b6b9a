export const GRAPH_HTTP_DISPATCHER = Symbol('GRAPH_HTTP_DISPATCHER');
