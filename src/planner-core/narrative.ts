import { NARRATIVE_PLACEHOLDERS } from '@shared/constants';
import { ConfigurationError } from './errors';

export type NarrativePlaceholder = (typeof NARRATIVE_PLACEHOLDERS)[number];
export type NarrativeValues = Record<NarrativePlaceholder, string>;

const PLACEHOLDER = /\{(\w+)\}/g;

export function placeholdersIn(template: string): string[] {
  return Array.from(template.matchAll(PLACEHOLDER), (m) => m[1]);
}

export function isKnownPlaceholder(name: string): name is NarrativePlaceholder {
  return (NARRATIVE_PLACEHOLDERS as readonly string[]).includes(name);
}

/**
 * Replaces `{name}` tokens. A token outside the known placeholder set is a
 * pack error and throws.
 */
export function fillTemplate(template: string, values: NarrativeValues): string {
  return template.replace(PLACEHOLDER, (_token, name: string) => {
    if (!isKnownPlaceholder(name)) {
      throw new ConfigurationError(`Unknown template placeholder {${name}}`);
    }
    return values[name];
  });
}
