import { join } from 'node:path';
import { env } from 'node:process';
import { Logger } from '@nestjs/common';

env.NODE_ENV = 'test';
env.LOG_LEVEL = 'silent';
env.TENANT_CONFIG_PATH = join(__dirname, 'fixtures/tenants.yaml');
env.CONTOSO_CLIENT_SECRET = 'test-secret';

// Silence Nest application logs during tests
Logger.overrideLogger(false);
