/**
 * Execution Evaluator - result-set equivalence between a reference and a predicted query
 */

import { normalizeResultSet, type NormalizedResultSet } from './result-set.js';
import { valueKey } from './value-normalizer.js';
import { isExecutionSuccess } from './evaluation-types.js';
import type { ExecutionResult, NormalizedRow } from './evaluation-types.js';

/**
 * Values of a row with column position and repeats dropped
 */
function valueSet(row: NormalizedRow): Set<string> {
    return new Set(row.map(valueKey));
}

function isSubset(inner: Set<string>, outer: Set<string>): boolean {
    for (const value of inner) {
        if (!outer.has(value)) {
            return false;
        }
    }
    return true;
}

/**
 * Decide whether two normalized result sets hold the same data.
 *
 * Identical membership passes straight away. Otherwise each predicted row must
 * share a value set with some actual row in either subset direction, which lets
 * extra or missing columns through. Rows are compared as value sets, so (5, "a")
 * and ("a", 5) are indistinguishable and (5, 5) is just {5}.
 *
 * The closing check compares the number of matched predicted rows with the
 * size of `actual`, not `predicted`: three predicted rows that each match one
 * of two actual rows fail. This count is intentional and pinned by tests.
 */
export function isEquivalent(actual: NormalizedResultSet, predicted: NormalizedResultSet): boolean {
    if (actual.equals(predicted)) {
        return true;
    }

    const actualValueSets = [...actual].map(valueSet);

    let matches = 0;
    for (const row of predicted) {
        const predictedValues = valueSet(row);
        const matched =
            actualValueSets.some(actualValues => isSubset(actualValues, predictedValues)) ||
            actualValueSets.some(actualValues => isSubset(predictedValues, actualValues));

        if (!matched) {
            return false;
        }
        matches++;
    }

    return matches === actual.size;
}

/**
 * Compare two executor results. A failed execution on either side is never
 * equivalent.
 */
export function evaluateExecutionSimilarity(
    reference: ExecutionResult,
    predicted: ExecutionResult
): boolean {
    if (!isExecutionSuccess(reference) || !isExecutionSuccess(predicted)) {
        return false;
    }

    return isEquivalent(
        normalizeResultSet(reference.data),
        normalizeResultSet(predicted.data)
    );
}
