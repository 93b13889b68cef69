import type { CredentialRepository, StoredCredentials } from '@marketsync/integrations-domain';
import { integrationCredentials } from '@marketsync/integrations-domain/drizzle';
import type { Database } from '@marketsync/process-lib';
import { eq } from 'drizzle-orm';

/** Holds ciphertext only; decryption happens in the vault. */
export class DrizzleCredentialRepository implements CredentialRepository {
  constructor(private readonly db: Database) {}

  async findByIntegration(integrationId: string): Promise<StoredCredentials | null> {
    const [row] = await this.db
      .select()
      .from(integrationCredentials)
      .where(eq(integrationCredentials.integrationId, integrationId));
    return row ?? null;
  }

  async upsert(record: StoredCredentials): Promise<void> {
    await this.db
      .insert(integrationCredentials)
      .values(record)
      .onConflictDoUpdate({
        target: integrationCredentials.integrationId,
        set: {
          ref: record.ref,
          ciphertext: record.ciphertext,
          keyVersion: record.keyVersion,
          updatedAt: record.updatedAt,
        },
      });
  }
}
