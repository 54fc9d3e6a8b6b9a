export { auditLoggerOptions, createAuditLogger } from './audit';
export { defaultLoggerOptions, defaultPinoHttpOptions, developmentTarget } from './options';
