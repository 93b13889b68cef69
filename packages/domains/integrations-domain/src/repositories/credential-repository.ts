/** Encrypted credential blob as stored; plaintext never reaches this layer. */
export interface StoredCredentials {
  ref: string;
  integrationId: string;
  ciphertext: string;
  keyVersion: number;
  updatedAt: Date;
}

export interface CredentialRepository {
  findByIntegration(integrationId: string): Promise<StoredCredentials | null>;
  upsert(record: StoredCredentials): Promise<void>;
}
