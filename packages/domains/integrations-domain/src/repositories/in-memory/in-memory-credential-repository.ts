import type { CredentialRepository, StoredCredentials } from '../credential-repository.js';

export class InMemoryCredentialRepository implements CredentialRepository {
  private readonly rows = new Map<string, StoredCredentials>();

  async findByIntegration(integrationId: string): Promise<StoredCredentials | null> {
    const row = this.rows.get(integrationId);
    return row ? { ...row } : null;
  }

  async upsert(record: StoredCredentials): Promise<void> {
    this.rows.set(record.integrationId, { ...record });
  }
}
