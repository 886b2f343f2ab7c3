/**
 * A single row of a table-driven test.
 *
 * @template T - The type of the expected result (defaults to unknown).
 */
export type TestScenario<T = unknown> = {
  /**
   * Short, unique identifier shown in test logs (e.g. "Nested Call").
   */
  id: string;

  /**
   * What the scenario demonstrates.
   */
  description: string;

  /**
   * Source code fed to the unit under test.
   */
  code: string;

  expected: T;
};
