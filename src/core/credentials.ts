/**
 * Credential capability for hosted backends.
 * Local backends (Ollama) never read from it.
 */

export interface Credential {
  username: string;
  secret: string;
}

export interface CredentialStore {
  read(url: string): Promise<Credential | undefined>;
  write(url: string, username: string, secret: string): Promise<void>;
  delete(url: string): Promise<void>;
}

export class InMemoryCredentialStore implements CredentialStore {
  private readonly entries = new Map<string, Credential>();

  async read(url: string): Promise<Credential | undefined> {
    const entry = this.entries.get(url);
    return entry ? { ...entry } : undefined;
  }

  async write(url: string, username: string, secret: string): Promise<void> {
    this.entries.set(url, { username, secret });
  }

  async delete(url: string): Promise<void> {
    this.entries.delete(url);
  }
}
