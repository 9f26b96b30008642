/** Statistics requested on input that has none to give (e.g. an empty sample) */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/** A measurement file could not be read, parsed, or failed schema checks */
export class MeasurementFileError extends Error {
  readonly path?: string;

  constructor(message: string, path?: string, options?: ErrorOptions) {
    super(path ? `${path}: ${message}` : message, options);
    this.name = "MeasurementFileError";
    this.path = path;
  }
}
