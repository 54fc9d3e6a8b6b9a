import { RequestMethod } from '@nestjs/common';
import type { Params } from 'nestjs-pino';
import type { Options } from 'pino-http';

export const developmentTarget = {
  // https://github.com/pinojs/pino-pretty?tab=readme-ov-file#handling-non-serializable-options
  target: 'pino-pretty',
  options: {
    translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
    ignore: 'hostname,pid',
  },
};

export const defaultPinoHttpOptions: Options = {
  enabled: true,
  level: 'info',
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'res.headers["set-cookie"]',
    ],
    censor: () => '[Redacted]',
  },
  transport: process.env.NODE_ENV === 'development' ? developmentTarget : undefined,
};

export const defaultLoggerOptions: Params = {
  renameContext: process.env.NODE_ENV !== 'production' ? 'caller' : undefined,
  pinoHttp: defaultPinoHttpOptions,
  exclude: [
    {
      method: RequestMethod.GET,
      path: 'probe',
    },
  ],
};
