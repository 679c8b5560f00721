/**
 * Raised when no catalog file exists for the requested domain and language
 */
export class CatalogNotFoundError extends Error {
  constructor(
    readonly domain: string,
    readonly language: string,
    readonly searchedPaths: string[]
  ) {
    super(`No translation file found for domain "${domain}" and language "${language}"`);
    this.name = 'CatalogNotFoundError';
  }
}

/**
 * Raised when a catalog file cannot be read or parsed
 */
export class CatalogFormatError extends Error {
  constructor(readonly filePath: string, reason: string) {
    super(`Invalid catalog file ${filePath}: ${reason}`);
    this.name = 'CatalogFormatError';
  }
}
