/**
 * Every matrix operation on a small example, rendered as text and as JSON
 */

import { createEngine, MATRIX_OPERATIONS, classifyError } from '../src/index.js';

const engine = createEngine();
const A = '[[4,7],[2,6]]';
const B = '[[1,0],[0,2]]';

for (const operation of MATRIX_OPERATIONS) {
  console.log(`=== ${operation} ===\n`);
  const result = engine.run(operation, A, { matrixB: B });
  console.log(engine.registry.getRenderer('text')?.render(result, 'text', 'detailed'));
  console.log();
}

console.log('=== JSON output ===\n');
console.log(engine.registry.getRenderer('json')?.render(engine.run('matrix_determinant', A), 'json', 'concise'));

console.log('\n=== Singular input ===\n');
try {
  engine.run('matrix_inverse', '[[1,2],[2,4]]');
} catch (err) {
  console.log(`${classifyError(err)} error: ${err instanceof Error ? err.message : String(err)}`);
}
