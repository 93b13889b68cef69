import { inspect } from 'node:util';

const REDACTED = '[redacted]';

/**
 * Opaque wrapper around decrypted credentials. The only way to read them is
 * `use()`; serialization and inspection print a placeholder.
 */
export class CredentialHandle<C extends object> {
  readonly #credentials: Readonly<C>;

  private constructor(
    readonly integrationId: string,
    readonly platformName: string,
    credentials: C,
  ) {
    this.#credentials = Object.freeze({ ...credentials });
  }

  static wrap<C extends object>(
    integrationId: string,
    platformName: string,
    credentials: C,
  ): CredentialHandle<C> {
    return new CredentialHandle(integrationId, platformName, credentials);
  }

  use<R>(fn: (credentials: Readonly<C>) => R): R {
    return fn(this.#credentials);
  }

  toJSON(): Record<string, string> {
    return {
      integrationId: this.integrationId,
      platformName: this.platformName,
      credentials: REDACTED,
    };
  }

  toString(): string {
    return `CredentialHandle(${this.platformName}:${this.integrationId}) ${REDACTED}`;
  }

  [inspect.custom](): string {
    return this.toString();
  }
}
