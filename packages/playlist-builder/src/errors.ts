/**
 * Error thrown when a boolean expression cannot be reduced
 */
export class MalformedExpressionError extends Error {
  constructor(
    message: string,
    public readonly expression: string
  ) {
    super(`${message}: "${expression}"`);
    this.name = 'MalformedExpressionError';
  }
}

/**
 * Error thrown when a `{Playlist Name}` selector names no existing playlist
 */
export class UnknownSelectorError extends Error {
  constructor(public readonly playlistName: string) {
    super(`${playlistName} not found`);
    this.name = 'UnknownSelectorError';
  }
}

export class InvalidTaxonomyError extends Error {
  constructor(
    message: string,
    public readonly entry: unknown
  ) {
    super(`${message}: ${JSON.stringify(entry)}`);
    this.name = 'InvalidTaxonomyError';
  }
}

/**
 * Error thrown for unusable configuration or collection files
 */
export class ConfigurationError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(source ? `${message} (${source})` : message);
    this.name = 'ConfigurationError';
  }
}
