export type AssetErrorCode = 'io' | 'format' | 'range';

// Base class for every failure raised while loading or rendering map assets.
// `path` is the asset file the error relates to, when known.
export class AssetError extends Error {
  constructor(
    public readonly code: AssetErrorCode,
    message: string,
    public readonly path?: string,
    options?: ErrorOptions,
  ) {
    super(path ? `${message} (${path})` : message, options);
    this.name = 'AssetError';
  }
}

// File missing or unreadable. The underlying fs error is kept as `cause`.
export class IoError extends AssetError {
  constructor(path: string, cause: unknown) {
    super('io', `cannot read: ${cause instanceof Error ? cause.message : String(cause)}`, path, { cause });
    this.name = 'IoError';
  }
}

// Size misalignment, header mismatch or an unsupported encoding.
export class FormatError extends AssetError {
  constructor(message: string, path?: string) {
    super('format', message, path);
    this.name = 'FormatError';
  }
}

// An index outside a table or atlas.
export class IndexRangeError extends AssetError {
  constructor(message: string, path?: string) {
    super('range', message, path);
    this.name = 'IndexRangeError';
  }
}

// Re-throw a path-less FormatError raised by a pure parser with the file it came from.
export function withAssetPath<T>(path: string, parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    if (err instanceof FormatError && err.path === undefined) {
      throw new FormatError(err.message, path);
    }
    throw err;
  }
}
