import { z } from 'zod';
import { IntegrationSettingsPatchSchema } from '../entities/integration-settings.js';

export const UpdateSettingsCommandSchema = z.object({
  integrationId: z.string().uuid(),
  name: z.string().min(1).optional(),
  settings: IntegrationSettingsPatchSchema,
});

export type UpdateSettingsCommand = z.infer<typeof UpdateSettingsCommandSchema>;

export function updateSettingsCommand(input: UpdateSettingsCommand): UpdateSettingsCommand {
  return UpdateSettingsCommandSchema.parse(input);
}
