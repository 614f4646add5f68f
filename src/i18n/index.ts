import type { I18nVars } from '../types';
import { en } from './en';

/**
 * Looks up a UI string and fills its `{name}` placeholders.
 * Unknown keys come back unchanged; placeholders without a value stay as written.
 * @param key The string key, e.g. `log.pathFound`.
 * @param vars Values for the placeholders.
 * @returns The finished string.
 */
export function t(key: string, vars?: I18nVars): string {
  const template: string = en[key] ?? key;
  if (!vars) {
    return template;
  }
  return template.replace(/\{(\w+)\}/g, (placeholder: string, name: string) => {
    const value: string | number | undefined = vars[name];
    return value === undefined ? placeholder : String(value);
  });
}
