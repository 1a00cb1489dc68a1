export interface AuthProvider {
  /** Read on every remote call; implementations must not be cached by callers. */
  currentToken(): Promise<string | null>;
}
