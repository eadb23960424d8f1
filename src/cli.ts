#!/usr/bin/env node

import { defaultRules } from './expr/rewrite/Rules.js';
import { serializeExpression } from './expr/ExpressionUtils.js';
import { builtinScenarios, runScenario, formatScenarioResult } from './scenarios.js';

function printUsage() {
  console.log(`
expr-rewriter - Pattern-based rewriting of arithmetic expression trees

Usage:
  expr-rewriter [options]

Options:
  --list-rules          Print the built-in rules in application order and exit
  --verbose             Log every optimization pass
  --help, -h            Show this help message

Without options, runs the built-in scenarios and reports whether each
optimized tree evaluates to the same value as its input.
  `.trim());
}

function listRules() {
  defaultRules.forEach((r, index) => {
    console.log(`${index + 1}. ${r.name}: ${serializeExpression(r.lhs)} => ${serializeExpression(r.rhs)}`);
  });
}

function main() {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  let verbose = false;
  let showRules = false;

  for (const arg of args) {
    if (arg === '--verbose') {
      verbose = true;
    } else if (arg === '--list-rules') {
      showRules = true;
    } else {
      console.error(`Error: Unknown option "${arg}"`);
      printUsage();
      process.exit(1);
    }
  }

  if (showRules) {
    listRules();
    process.exit(0);
  }

  try {
    const results = builtinScenarios.map(scenario => runScenario(scenario, { verbose }));
    results.forEach(result => console.log(formatScenarioResult(result)));

    const failures = results.filter(result => !result.passed).length;
    if (failures > 0) {
      console.error(`${failures} of ${results.length} scenario(s) failed.`);
      process.exit(1);
    }

    console.log('All scenarios passed.');
  } catch (err) {
    console.error('Error: Failed to run scenarios');
    if (err instanceof Error) {
      console.error(err.message);
      if (err.stack) {
        console.error('\nStack trace:');
        console.error(err.stack);
      }
    }
    process.exit(1);
  }
}

main();
