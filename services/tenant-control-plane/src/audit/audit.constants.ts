export const MAX_AUDIT_QUERY_LIMIT = 1000;
export const DEFAULT_AUDIT_QUERY_LIMIT = 100;
