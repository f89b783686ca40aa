/**
 * Numerical gradient checking
 * Validates symbolic derivatives against central finite differences
 */

import type { ExpressionNode } from './ExpressionNode.js';
import type { InputParameterNode } from './Leaves.js';
import { TypeMismatchError } from './Errors.js';

/**
 * Gradient checking result
 */
export interface GradCheckResult {
  passed: boolean;
  errors: GradCheckError[];
  maxError: number;
  meanError: number;
  totalChecks: number;
}

export interface GradCheckError {
  point: number;
  analytical: number;
  numerical: number;
  error: number;
  relativeError: number;
}

/**
 * Format gradient check results as a human-readable string
 */
export function formatGradCheckResult(result: GradCheckResult, name: string): string {
  if (result.passed) {
    return `✓ ${name}: ${result.totalChecks} derivatives verified`;
  }

  const lines: string[] = [
    `✗ ${name}: ${result.errors.length}/${result.totalChecks} derivatives FAILED`
  ];
  for (const e of result.errors) {
    lines.push(
      `  at ${e.point}: analytical=${e.analytical.toFixed(6)}, numerical=${e.numerical.toFixed(6)}, error=${e.error.toExponential(2)}`
    );
  }
  return lines.join('\n');
}

export interface GradientCheckerOptions {
  verbose?: boolean;
}

/**
 * Gradient checker
 */
export class GradientChecker {
  private epsilon: number;
  private tolerance: number;
  private verbose: boolean;

  constructor(epsilon: number = 1e-6, tolerance: number = 1e-4, options: GradientCheckerOptions = {}) {
    const { verbose = false } = options;
    this.epsilon = epsilon;
    this.tolerance = tolerance;
    this.verbose = verbose;
  }

  /**
   * Compare d(expression)/d(variable) with finite differences at each point.
   * Other inputs the expression needs are taken from `inputs`.
   */
  check(
    expression: ExpressionNode,
    variable: InputParameterNode,
    points: readonly number[],
    inputs: Readonly<Record<string, number>> = {}
  ): GradCheckResult {
    const derivative = expression.diff(variable);
    const errors: GradCheckError[] = [];
    const checked: number[] = [];

    for (const point of points) {
      const analytical = this.evaluateAt(derivative, variable, point, inputs);
      const numerical = this.numericalDerivative(expression, variable, point, inputs);

      const error = Math.abs(analytical - numerical);
      const relativeError = Math.abs(error / (numerical + 1e-10));
      checked.push(error);

      // absolute near zero, relative for large slopes
      if (!(error <= this.tolerance * Math.max(1, Math.abs(numerical)))) {
        errors.push({ point, analytical, numerical, error, relativeError });
      }
    }

    const maxError = checked.length > 0 ? Math.max(...checked) : 0;
    const meanError = checked.length > 0
      ? checked.reduce((sum, e) => sum + e, 0) / checked.length
      : 0;

    if (this.verbose) {
      console.log(`[gradcheck] ${expression.toString()}: ${points.length} points, max error ${maxError.toExponential(2)}`);
    }

    return {
      passed: errors.length === 0,
      errors,
      maxError,
      meanError,
      totalChecks: points.length
    };
  }

  /**
   * Central difference: (f(x+h) - f(x-h)) / (2h)
   */
  private numericalDerivative(
    expression: ExpressionNode,
    variable: InputParameterNode,
    point: number,
    inputs: Readonly<Record<string, number>>
  ): number {
    const fPlus = this.evaluateAt(expression, variable, point + this.epsilon, inputs);
    const fMinus = this.evaluateAt(expression, variable, point - this.epsilon, inputs);
    return (fPlus - fMinus) / (2 * this.epsilon);
  }

  private evaluateAt(
    expression: ExpressionNode,
    variable: InputParameterNode,
    point: number,
    inputs: Readonly<Record<string, number>>
  ): number {
    const value = expression.evaluate({ inputs: { ...inputs, [variable.name]: point } });
    if (typeof value !== 'number') {
      throw new TypeMismatchError('gradient checks need scalar expressions', 'gradcheck', 'matrix');
    }
    return value;
  }
}
