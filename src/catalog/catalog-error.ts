/**
 * CatalogError
 *
 * Thrown when the model record sequence cannot be obtained at all,
 * either from the listing endpoint or from a local file.
 */

export type CatalogErrorKind =
  | 'request'   // Network failure or timeout
  | 'http'      // Non-2xx response
  | 'parse'     // Body is not valid JSON
  | 'format'    // Body is JSON but not a list of records
  | 'file';     // Local input file could not be read

export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly kind: CatalogErrorKind,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'CatalogError';
    // Restore prototype chain for instanceof checks when targeting ES5
    Object.setPrototypeOf(this, CatalogError.prototype);
  }
}
