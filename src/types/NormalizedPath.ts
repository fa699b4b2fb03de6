declare const normalizedPathBrand: unique symbol;

/**
 * An absolute virtual filesystem path with no `.` or `..` segments, no
 * repeated separators and no trailing separator (except for the root).
 *
 * Values of this type are produced by `normalizePath` only.
 */
export type NormalizedPath = string & { readonly [normalizedPathBrand]: true };
