import { Command, CommanderError, type OutputConfiguration } from 'commander';
import { z } from 'zod';
import { DEFAULT_LIST_USERS_TOP } from '../tenant/tenant-operations';
import { requiredStringSchema } from '../utils/zod.util';

const commonFields = {
  configPath: requiredStringSchema.describe('--config'),
  tenantId: requiredStringSchema.describe('--tenant-id'),
  correlationId: requiredStringSchema.optional(),
};

const CliCommandSchema = z.discriminatedUnion('operation', [
  z.object({
    ...commonFields,
    operation: z.literal('list-users'),
    top: z.coerce.number().int().min(1).max(999).default(DEFAULT_LIST_USERS_TOP),
  }),
  z.object({
    ...commonFields,
    operation: z.literal('create-security-group'),
    groupName: requiredStringSchema.describe('--group-name'),
    groupDescription: requiredStringSchema.describe('--group-description'),
  }),
]);

export type CliCommand = z.infer<typeof CliCommandSchema>;

export class CliUsageError extends Error {}

const HELP_CODES = new Set(['commander.helpDisplayed', 'commander.help']);

export function createCliProgram(output: OutputConfiguration = {}): Command {
  return new Command()
    .name('tenant-control-plane')
    .description('Run a Microsoft Graph operation against one configured tenant')
    .option('--config <path>', 'Tenant configuration file (YAML)')
    .option('--tenant-id <id>', 'Tenant to operate on')
    .option('--operation <name>', 'list-users | create-security-group')
    .option('--top <n>', 'Page size for list-users', String(DEFAULT_LIST_USERS_TOP))
    .option('--group-name <name>', 'Display name for create-security-group')
    .option('--group-description <text>', 'Description for create-security-group')
    .option('--correlation-id <id>', 'Reuse a correlation id instead of generating one')
    .allowExcessArguments(false)
    .exitOverride()
    // usage errors are reported by the caller together with the help text
    .configureOutput({ outputError: () => undefined, ...output });
}

/** Returns undefined when help was requested. */
export function parseCliArguments(
  argv: string[],
  program: Command = createCliProgram(),
): CliCommand | undefined {
  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (!(error instanceof CommanderError)) {
      throw error;
    }
    if (HELP_CODES.has(error.code)) {
      return undefined;
    }
    throw new CliUsageError(error.message, { cause: error });
  }

  const values: Record<string, unknown> = program.opts();
  const result = CliCommandSchema.safeParse({
    configPath: values.config,
    tenantId: values.tenantId,
    operation: values.operation,
    top: values.top,
    groupName: values.groupName,
    groupDescription: values.groupDescription,
    correlationId: values.correlationId,
  });
  if (!result.success) {
    throw new CliUsageError(z.prettifyError(result.error), { cause: result.error });
  }
  return result.data;
}
