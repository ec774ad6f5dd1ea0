export class MatchLookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MatchLookupError';
  }
}
