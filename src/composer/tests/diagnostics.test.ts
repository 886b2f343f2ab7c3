import { describe, expect, test } from 'vitest';

import type { TestScenario } from '../../test-utils/scenario';
import {
  ClassNotFoundError,
  ConfigurationError,
  DuplicateKeyError,
  UnsupportedTypeError
} from '../../errors';
import { DiagnosticsCollector } from '../diagnostics';

describe('Diagnostics Collector', () => {
  describe('reportError', () => {
    const scenarios: (TestScenario<{ code: string; element: string | null }> & {
      error: unknown;
    })[] = [
      {
        id: 'Duplicate Key',
        description: 'Code derived from the error class',
        code: 'DuplicateKeyError',
        error: new DuplicateKeyError('Pair', 'v', 'a', 'b'),
        expected: { code: 'duplicate-key', element: 'Pair.b' }
      },
      {
        id: 'Class Not Found',
        description: 'Multi-word class names are dashed',
        code: 'ClassNotFoundError',
        error: new ClassNotFoundError('Ghost', 'src/model.js'),
        expected: { code: 'class-not-found', element: 'Ghost' }
      },
      {
        id: 'Unsupported Type',
        description: 'Element kept from the error',
        code: 'UnsupportedTypeError',
        error: new UnsupportedTypeError('symbol', 'Point.x'),
        expected: { code: 'unsupported-type', element: 'Point.x' }
      },
      {
        id: 'Configuration',
        description: 'Single-word class names',
        code: 'ConfigurationError',
        error: new ConfigurationError('Invalid.', 'Point'),
        expected: { code: 'configuration', element: 'Point' }
      },
      {
        id: 'Internal',
        description: 'Foreign errors are internal',
        code: 'TypeError',
        error: new TypeError('x is not a function'),
        expected: { code: 'internal', element: null }
      },
      {
        id: 'Non-Error',
        description: 'Thrown non-errors are wrapped',
        code: 'string',
        error: 'boom',
        expected: { code: 'internal', element: null }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ error, expected }) => {
      const collector = new DiagnosticsCollector('src/model.js');
      collector.reportError(error);

      expect(collector.diagnostics).toEqual([
        {
          severity: 'error',
          code: expected.code,
          message: error instanceof Error ? error.message : String(error),
          element: expected.element,
          unit: 'src/model.js'
        }
      ]);
    });
  });

  test('hasErrors ignores warnings and infos', () => {
    const collector = new DiagnosticsCollector('src/model.js');
    collector.info('note', 'Informational.');
    collector.warning('careful', 'Careful.', 'Point');

    expect(collector.hasErrors()).toBe(false);

    collector.error('broken', 'Broken.');

    expect(collector.hasErrors()).toBe(true);
    expect(collector.diagnostics.map(entry => entry.severity)).toEqual(['info', 'warning', 'error']);
  });
});
