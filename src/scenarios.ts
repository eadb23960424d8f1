/**
 * Built-in end-to-end scenarios: each input is evaluated before and after
 * optimization and both results are checked against the expected value.
 */

import { Expression, num, add, freezeExpression } from './expr/AST.js';
import { evaluate } from './expr/Evaluate.js';
import { serializeExpression } from './expr/ExpressionUtils.js';
import { optimize, OptimizeOptions } from './expr/rewrite/Rewriter.js';

export interface Scenario {
  name: string;
  input: Expression;
  expected: number;
}

export interface ScenarioResult {
  name: string;
  input: string;
  output: string;
  inputValue: number;
  outputValue: number;
  passed: boolean;
}

function scenario(name: string, input: Expression, expected: number): Scenario {
  return Object.freeze({ name, input: freezeExpression(input), expected });
}

export const builtinScenarios: readonly Scenario[] = Object.freeze([
  // 0 + 1 -> 1
  scenario('left-zero', add(num(0), num(1)), 1),
  // 1 + 0 -> 1
  scenario('right-zero', add(num(1), num(0)), 1),
]);

export function runScenario(scenario: Scenario, options: OptimizeOptions = {}): ScenarioResult {
  const output = optimize(scenario.input, options);
  const inputValue = evaluate(scenario.input);
  const outputValue = evaluate(output);

  return {
    name: scenario.name,
    input: serializeExpression(scenario.input),
    output: serializeExpression(output),
    inputValue,
    outputValue,
    passed: inputValue === scenario.expected && outputValue === scenario.expected
  };
}

/**
 * Format a scenario result as a single report line
 */
export function formatScenarioResult(result: ScenarioResult): string {
  const status = result.passed ? 'PASS' : 'FAIL';
  return `${status} ${result.name}: ${result.input} = ${result.inputValue} -> ${result.output} = ${result.outputValue}`;
}
