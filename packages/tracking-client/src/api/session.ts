import { NotAuthenticatedError } from './errors';

/**
 * Holds the token issued by login. The token is only ever replaced by another
 * successful login; concurrent requests just read it.
 */
export class Session {
  private token: string | null = null;

  get isAuthenticated(): boolean {
    return this.token !== null && this.token.length > 0;
  }

  /** Ignores empty tokens so a bad login never clears a good session. */
  establish(token: string | null | undefined): boolean {
    if (!token) return false;
    this.token = token;
    return true;
  }

  ensureAuthenticated(): void {
    if (!this.isAuthenticated) throw new NotAuthenticatedError();
  }

  authHeaders(): Record<string, string> {
    this.ensureAuthenticated();
    return { Authorization: `Bearer ${this.token}` };
  }
}
