import type { TenantOrchestrator } from '../tenant/tenant-orchestrator';
import type { CliCommand } from './parse-cli-arguments';

export interface CliResult {
  correlationId: string;
  result: unknown;
}

export async function executeCommand(
  orchestrator: TenantOrchestrator,
  command: CliCommand,
  correlationId: string,
): Promise<CliResult> {
  switch (command.operation) {
    case 'list-users': {
      const { top } = command;
      const result = await orchestrator.runOperation(
        command.tenantId,
        (operations) => operations.listUsers(top),
        correlationId,
      );
      return { correlationId, result };
    }
    case 'create-security-group': {
      const { groupName, groupDescription } = command;
      const result = await orchestrator.runOperation(
        command.tenantId,
        (operations) => operations.createGroup(groupName, groupDescription),
        correlationId,
      );
      return { correlationId, result };
    }
  }
}
