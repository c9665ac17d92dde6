/**
 * Path helpers for project settings.
 *
 * @packageDocumentation
 */

/**
 * Converts a path to forward-slash form.
 *
 * @param path - Path using any separator style.
 * @returns The path with every backslash replaced by a forward slash.
 *
 * @example
 * ```typescript
 * toForwardSlashes('src\\core'); // 'src/core'
 * ```
 */
export function toForwardSlashes(path: string): string {
  return path.replace(/\\/g, '/');
}

/**
 * Converts every path of a list to forward-slash form.
 *
 * @param paths - Paths using any separator style.
 * @returns A new list of normalized paths in the same order.
 */
export function toForwardSlashesAll(paths: readonly string[]): string[] {
  return paths.map(toForwardSlashes);
}

/**
 * Whether a platform setting names a platform description document
 * instead of a built-in platform keyword.
 *
 * @param platform - The platform setting.
 * @returns True when the value ends with `.xml` (any case).
 */
export function isPlatformFile(platform: string): boolean {
  return platform.toLowerCase().endsWith('.xml');
}
