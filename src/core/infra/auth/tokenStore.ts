import type { AuthProvider } from '../../app/ports/authProvider';

/** Holds the bearer token issued at login; read again on every remote call. */
export class InMemoryTokenStore implements AuthProvider {
  private token: string | null;

  constructor(initialToken: string | null = null) {
    this.token = initialToken;
  }

  async currentToken(): Promise<string | null> {
    return this.token;
  }

  setToken(token: string): void {
    this.token = token.trim().length > 0 ? token : null;
  }

  clear(): void {
    this.token = null;
  }
}
