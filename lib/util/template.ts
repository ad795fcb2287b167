import { ConfigError } from '../errors';

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_.-]*)\s*\}\}/g;

/**
 * Replace every '{{name}}' in the text with the value the lookup returns
 *
 * Every placeholder must resolve; the error lists the ones that don't.
 */
export function interpolate(text: string, lookup: (name: string) => string | undefined): string {
  const missing = new Array<string>();
  const ret = text.replace(PLACEHOLDER, (match, name: string) => {
    const value = lookup(name);
    if (value === undefined) {
      missing.push(name);
      return match;
    }
    return value;
  });

  if (missing.length > 0) {
    throw new ConfigError(`No value for ${missing.map(m => `'${m}'`).join(', ')} in '${text}'`);
  }
  return ret;
}
