/**
 * Runtime Utilities
 *
 * Property access and HTML escaping used by the renderer and the built-in
 * formatters.
 */

// Cache hasOwnProperty reference for performance
const hasOwnProperty = Object.prototype.hasOwnProperty;

/**
 * Security-aware property lookup that prevents prototype pollution attacks.
 *
 * Only returns own properties, never inherited properties. A registry built
 * from an object literal therefore never resolves `constructor`,
 * `__proto__` or `toString`.
 *
 * @example
 * ```typescript
 * const formatters = { upper: (v) => ... };
 * lookupProperty(formatters, 'upper'); // the formatter
 * lookupProperty(formatters, 'toString'); // undefined
 * ```
 */
export function lookupProperty<T>(parent: Readonly<Record<string, T>>, propertyName: string): T | undefined {
  if (hasOwnProperty.call(parent, propertyName)) {
    return parent[propertyName];
  }
  return undefined;
}

/**
 * Escape characters for HTML output.
 *
 * Escapes 7 characters that are significant in HTML:
 * & < > " ' ` =
 */
const escapeMap: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
  '`': '&#x60;',
  '=': '&#x3D;',
};

// Regex to detect characters that need escaping
const escapeRegex = /[&<>"'`=]/g;
const needsEscapeRegex = /[&<>"'`=]/;

/**
 * Escapes HTML entities for safe output in HTML contexts.
 *
 * @example
 * ```typescript
 * escapeExpression('<script>alert("xss")</script>');
 * // '&lt;script&gt;alert(&quot;xss&quot;)&lt;/script&gt;'
 * ```
 */
export function escapeExpression(str: string): string {
  // Fast path: if no special characters, return original string
  if (!needsEscapeRegex.test(str)) {
    return str;
  }

  // Replace all special characters with their HTML entity equivalents
  return str.replace(escapeRegex, (char) => escapeMap[char] ?? char);
}
