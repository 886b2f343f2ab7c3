import type { JsonEnumPass } from './pass';

import { enumValuesFragment } from '../emitter/helpers';

/**
 * Emits the values table of every `@enum` constant. Classes decoding an enum
 * request the same table, which the composer collapses into one copy.
 */
export function createJsonEnumPass(): JsonEnumPass {
  return {
    kind: 'json-enum',
    run(unit) {
      const fragments: string[] = [];

      for (const element of unit.elements) {
        if (element.kind === 'enum') {
          fragments.push(enumValuesFragment(element.model));
        }
      }

      return { fragments, patches: [] };
    }
  };
}
