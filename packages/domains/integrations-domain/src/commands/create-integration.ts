import { z } from 'zod';
import { PlatformNameSchema } from '../entities/integration.js';
import { IntegrationSettingsPatchSchema } from '../entities/integration-settings.js';

export const CreateIntegrationCommandSchema = z.object({
  platformName: PlatformNameSchema,
  name: z.string().min(1).optional(),
  settings: IntegrationSettingsPatchSchema.default({}),
});

export type CreateIntegrationCommand = z.infer<typeof CreateIntegrationCommandSchema>;

export function createIntegrationCommand(
  input: z.input<typeof CreateIntegrationCommandSchema>,
): CreateIntegrationCommand {
  return CreateIntegrationCommandSchema.parse(input);
}
