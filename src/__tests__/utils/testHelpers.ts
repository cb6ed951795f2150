/**
 * Test helper utilities for narrowing scenario results
 */

import { ScenarioResult, ScenarioError } from '../../models/ScenarioResult';

export function isEvaluated<R extends ScenarioResult>(result: R): result is Exclude<R, ScenarioError> {
  return result.status !== 'error';
}

/**
 * Return the result narrowed to its evaluated variants, failing the test on an error outcome
 */
export function evaluated<R extends ScenarioResult>(result: R): Exclude<R, ScenarioError> {
  if (!isEvaluated(result)) {
    throw new Error(`Expected an evaluated scenario, got ${JSON.stringify(result)}`);
  }
  return result;
}
