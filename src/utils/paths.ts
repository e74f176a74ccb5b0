export type PathContext = {
  /** The generated file the map describes. */
  file: string;
  /** Position of the source in the emitted `sources` array. */
  index: number;
};

/**
 * Turns a source key of a position index into the string written to the
 * `sources` array.
 */
export type PathRelativizer = (path: string, context: PathContext) => string;

export type RelativizeOptions = {
  /** Directory the generated files are written to. */
  outputDir?: string;
  /** Prefix for emitted sources; takes precedence over `outputDir`. */
  sourceMapPath?: string;
  /** Source path → path relative to the output directory. */
  relpaths?: Record<string, string>;
};

export const identityPath: PathRelativizer = (path) => path;

/**
 * Last `/`-separated segment of a path.
 */
export function baseName(path: string): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

/**
 * Calculate relative path from one file to another.
 */
export function relativePath(from: string, to: string): string {
  const fromParts = from.split('/').slice(0, -1); // Remove filename
  const toParts = to.split('/');

  let commonLength = 0;
  while (
    commonLength < fromParts.length &&
    commonLength < toParts.length &&
    fromParts[commonLength] === toParts[commonLength]
  ) {
    commonLength++;
  }

  const ups = fromParts.length - commonLength;
  const remaining = toParts.slice(commonLength);

  return [...Array<string>(ups).fill('..'), ...remaining].join('/');
}

/**
 * Default relativizer used when writing maps next to build output.
 *
 * Without an output location only the base name of each source is kept.
 * Sources inside an archive (`lib.jar!/pkg/a.js`) keep their entry path, and
 * absolute sources missing from `relpaths` keep their base name.
 */
export function relativizeSourcePath(options: RelativizeOptions = {}): PathRelativizer {
  const { outputDir, sourceMapPath, relpaths = {} } = options;
  const prefix = sourceMapPath ?? outputDir;

  return (path) => {
    if (prefix === undefined) {
      return baseName(path);
    }

    const archiveSeparator = path.indexOf('!/');
    if (archiveSeparator !== -1) {
      return prefix + path.slice(archiveSeparator + 1);
    }

    const known = relpaths[path];
    if (known !== undefined) {
      return `${prefix}/${known}`;
    }

    // An absolute path has no common prefix with a relative output directory.
    const relative = path.startsWith('/') ? baseName(path) : relativePath(`${outputDir ?? prefix}/`, path);
    return `${prefix}/${relative}`;
  };
}
