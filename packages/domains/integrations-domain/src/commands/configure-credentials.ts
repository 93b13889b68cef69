import { z } from 'zod';

export const ConfigureCredentialsCommandSchema = z.object({
  integrationId: z.string().uuid(),
  credentials: z.record(z.string(), z.unknown()),
});

export type ConfigureCredentialsCommand = z.infer<typeof ConfigureCredentialsCommandSchema>;

export function configureCredentialsCommand(
  input: ConfigureCredentialsCommand,
): ConfigureCredentialsCommand {
  return ConfigureCredentialsCommandSchema.parse(input);
}
