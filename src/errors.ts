/**
 * Base class for failures to turn a named metadata resource into a record.
 * All of these are fatal to the lookup that triggered the load.
 */
export class MetadataResourceError extends Error {
  public readonly resourceName: string;

  public constructor(message: string, resourceName: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.resourceName = resourceName;
  }
}

/**
 * The loader has no resource under the requested name. This points at a packaging or
 * deployment problem rather than anything a caller can recover from.
 */
export class MissingResourceError extends MetadataResourceError {
  public constructor(resourceName: string) {
    super(`missing metadata: ${resourceName}`, resourceName);
  }
}

/**
 * The resource could not be read or decoded. The underlying failure is kept as `cause`.
 */
export class CorruptResourceError extends MetadataResourceError {
  public constructor(resourceName: string, cause: unknown) {
    super(`cannot load/parse metadata: ${resourceName}`, resourceName, { cause });
  }
}

/**
 * The resource decoded cleanly but held no records.
 */
export class EmptyResourceError extends MetadataResourceError {
  public constructor(resourceName: string) {
    super(`empty metadata: ${resourceName}`, resourceName);
  }
}

export const isMetadataResourceError = (error: unknown): error is MetadataResourceError =>
  error instanceof MetadataResourceError;
