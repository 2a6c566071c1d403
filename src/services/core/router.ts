export type ExtensionMap = Readonly<Record<string, string>>;

/**
 * Looks up the category folder for a dotted extension such as `.jpg`.
 * Returns null when the extension is not configured, which callers treat as
 * "leave the file where it is".
 */
export function classify(extension: string, extensionMap: ExtensionMap): string | null {
  const key = extension.toLowerCase();
  if (!Object.prototype.hasOwnProperty.call(extensionMap, key)) {
    return null;
  }
  return extensionMap[key];
}

// Distinct category names, in first-seen order.
export function categories(extensionMap: ExtensionMap): string[] {
  return [...new Set(Object.values(extensionMap))];
}
