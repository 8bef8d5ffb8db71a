/**
 * Basic Usage Example
 *
 * Checks a few arrays against shape patterns and prints what each check
 * reports.
 */

import { checkShapes, checkShape, matchShapes, ANY, ShapeError } from '../src/index.js';

/** Minimal ndarray-style value: anything with a `shape` works */
function tensor(...shape: number[]) {
  return { shape };
}

function basicExamples() {
  console.log('=== shapecheck Basic Examples ===\n');

  // Example 1: shared symbols
  console.log('--- Example 1: Shared Symbols ---');
  console.log("x: (4, 3, 2) as (B, D, 2), y: (4, 5, 3) as (B, 5, D)\n");

  {
    const x = tensor(4, 3, 2);
    const y = tensor(4, 5, 3);

    const { bindings } = matchShapes([x, y], [['B', 'D', 2], ['B', 5, 'D']]);
    console.log('Bindings:', bindings);
    console.log();
  }

  // Example 2: wildcards and nested arrays
  console.log('--- Example 2: Wildcards ---');
  console.log('[[1, 2, 3], [4, 5, 6]] as (*, 3)\n');

  {
    const rows = checkShape(
      [
        [1, 2, 3],
        [4, 5, 6],
      ],
      [ANY, 3]
    );
    console.log('Rows:', rows.length);
    console.log();
  }

  // Example 3: a conflict
  console.log('--- Example 3: Symbol Conflict ---');
  console.log('x: (4, 3, 2), y: (5, 5, 3), same patterns\n');

  try {
    checkShapes([tensor(4, 3, 2), tensor(5, 5, 3)], [['B', 'D', 2], ['B', 5, 'D']]);
  } catch (err) {
    if (!(err instanceof ShapeError)) throw err;
    console.log(`${err.name}: ${err.message}`);
    console.log();
  }

  // Example 4: every mismatch at once
  console.log('--- Example 4: Collect All ---');
  console.log('x: (4, 3), y: (4, 7, 9) as (B, 3, 2) and (B, D, 2)\n');

  try {
    checkShapes([tensor(4, 3), tensor(4, 7, 9)], [['B', 3, 2], ['B', 'D', 2]], {
      policy: 'collect-all',
    });
  } catch (err) {
    if (!(err instanceof ShapeError)) throw err;
    console.log(`${err.name}: ${err.message}`);
    console.log('Mismatches:', err.mismatches.map((m) => m.kind).join(', '));
    console.log();
  }
}

basicExamples();
