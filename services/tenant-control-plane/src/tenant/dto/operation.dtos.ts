import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';
import { DEFAULT_LIST_USERS_TOP } from '../tenant-operations';

const ListUsersSchema = z.object({
  top: z
    .number()
    .int()
    .min(1)
    .max(999)
    .default(DEFAULT_LIST_USERS_TOP)
    .describe('Number of users to return'),
});

const CreateGroupSchema = z.object({
  displayName: z.string().trim().nonempty().max(256).describe('Display name of the new group'),
  description: z.string().max(1024).describe('Description of the new group'),
});

export class ListUsersDto extends createZodDto(ListUsersSchema) {}
export class CreateGroupDto extends createZodDto(CreateGroupSchema) {}
