// Provider-agnostic auth error.
// Thrown by the Google client layer whenever stored tokens are missing or unusable.

/**
 * Error thrown when the account needs to (re-)authorize with Google.
 */
export class AuthRequiredError extends Error {
  constructor(public account: string) {
    super(`Google authorization required for account "${account}". Run \`npm run auth\` first.`);
    this.name = 'AuthRequiredError';
  }
}
