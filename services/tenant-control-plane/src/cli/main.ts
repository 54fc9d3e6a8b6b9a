#!/usr/bin/env node
import 'reflect-metadata';
import { randomUUID } from 'node:crypto';
import { normalizeError } from '@control-plane/utils';
import { NestFactory } from '@nestjs/core';
import { ControlPlaneError } from '../errors';
import { TenantOrchestrator } from '../tenant/tenant-orchestrator';
import { CliModule } from './cli.module';
import { executeCommand } from './execute-command';
import {
  type CliCommand,
  CliUsageError,
  createCliProgram,
  parseCliArguments,
} from './parse-cli-arguments';

const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

async function run(argv: string[]): Promise<number> {
  const program = createCliProgram();
  let command: CliCommand | undefined;
  try {
    command = parseCliArguments(argv, program);
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n\n${program.helpInformation()}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  // commander has already printed the help text
  if (!command) {
    return 0;
  }

  const correlationId = command.correlationId ?? randomUUID();
  process.env.TENANT_CONFIG_PATH = command.configPath;
  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: ['error', 'warn'],
  });

  try {
    const output = await executeCommand(app.get(TenantOrchestrator), command, correlationId);
    process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
    return 0;
  } catch (error) {
    if (!(error instanceof ControlPlaneError)) {
      throw error;
    }
    process.stderr.write(`${error.name}: ${error.message} (correlation id: ${correlationId})\n`);
    return EXIT_FAILURE;
  } finally {
    await app.close();
  }
}

run(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${normalizeError(error).stack ?? normalizeError(error).message}\n`);
    process.exitCode = EXIT_FAILURE;
  });
