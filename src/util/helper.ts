/**
 * Prefixes the given rawOutput with the specified prefix if it's a relative path.
 */
export function prefixPath(prefix: string, rawOutput?: string): string | undefined {
  if (!rawOutput) return undefined;
  if (isAbsolute(rawOutput) || rawOutput === prefix || rawOutput.startsWith(`${prefix}/`)) {
    return rawOutput;
  }
  return `${prefix}/${rawOutput.replace(/^\.\//, "")}`;
}

function isAbsolute(path: string): boolean {
  return path.startsWith("/") || /^[a-zA-Z]:[\\/]/.test(path);
}
