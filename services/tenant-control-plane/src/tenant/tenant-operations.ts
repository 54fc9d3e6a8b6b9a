import type { Group } from '@microsoft/microsoft-graph-types';
import { z } from 'zod';
import type { ExecutionContext } from './execution-context.interface';

export const DEFAULT_LIST_USERS_TOP = 10;
const MAIL_NICKNAME_MAX_LENGTH = 64;

const GraphUserSchema = z.looseObject({
  id: z.string(),
  displayName: z.string().nullish(),
  userPrincipalName: z.string().nullish(),
  mail: z.string().nullish(),
});

const GraphUserCollectionSchema = z.looseObject({
  value: z.array(GraphUserSchema),
});

const GraphGroupSchema = z.looseObject({
  id: z.string(),
  displayName: z.string().nullish(),
  description: z.string().nullish(),
  mailNickname: z.string().nullish(),
  securityEnabled: z.boolean().nullish(),
});

export type GraphUser = z.infer<typeof GraphUserSchema>;
export type GraphGroup = z.infer<typeof GraphGroupSchema>;

/** Graph only accepts ASCII letters and digits in a mail nickname. */
export function toMailNickname(displayName: string): string {
  const nickname = displayName
    .normalize('NFKD')
    .replace(/[^A-Za-z0-9]/g, '')
    .slice(0, MAIL_NICKNAME_MAX_LENGTH);
  return nickname || 'group';
}

/** The Graph calls an operation can make, bound to one execution context. */
export class TenantOperations {
  public constructor(private readonly context: ExecutionContext) {}

  public get tenantId(): string {
    return this.context.tenantId;
  }

  public get correlationId(): string {
    return this.context.correlationId;
  }

  public async listUsers(top = DEFAULT_LIST_USERS_TOP): Promise<GraphUser[]> {
    const response = await this.context.dispatcher.get(`/v1.0/users?$top=${top}`);
    return GraphUserCollectionSchema.parse(response.body).value;
  }

  public async createGroup(displayName: string, description: string): Promise<GraphGroup> {
    const payload: Group = {
      displayName,
      description,
      mailEnabled: false,
      mailNickname: toMailNickname(displayName),
      securityEnabled: true,
      groupTypes: [],
    };
    const response = await this.context.dispatcher.post('/v1.0/groups', payload);
    return GraphGroupSchema.parse(response.body);
  }
}

export type TenantOperation<T> = (operations: TenantOperations) => Promise<T>;
