const GLOB_SPECIAL = /[*?[\]\\]/g;

export function escapeGlob(text: string): string {
  return text.replace(GLOB_SPECIAL, '\\$&');
}

/**
 * Maps caller keys to store keys under an optional `<prefix>:` namespace
 */
export class KeySpace {
  constructor(private readonly prefix: string = '') {}

  key(key: string): string {
    return this.prefix ? `${this.prefix}:${key}` : key;
  }

  strip(storeKey: string): string {
    return this.prefix ? storeKey.slice(this.prefix.length + 1) : storeKey;
  }

  pattern(pattern: string): string {
    return this.prefix ? `${escapeGlob(this.prefix)}:${pattern}` : pattern;
  }
}
