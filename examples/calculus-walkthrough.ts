/**
 * Step-by-step derivatives at each verbosity, checked against the backend solver
 */

import { createEngine, VERBOSITIES } from '../src/index.js';

const engine = createEngine();
const text = engine.registry.getRenderer('text');
if (!text) throw new Error('text renderer missing');

for (const expression of ['x**2', 'sin(x**2)', 'sin(x)*cos(x)', 'exp(x)/x']) {
  console.log(`=== d/dx ${expression} ===\n`);
  const result = engine.run('differentiate', expression);
  console.log(text.render(result, 'text', 'detailed'));

  const direct = engine.registry.getSolver('differentiate')?.solve(expression);
  console.log(`\nBackend answer: ${direct?.output ?? '(no solver)'}\n`);
}

console.log('=== Verbosity levels for d/dx x**3 ===\n');
const cubic = engine.run('differentiate', 'x**3');
for (const verbosity of VERBOSITIES) {
  console.log(`--- ${verbosity} ---`);
  console.log(text.render(cubic, 'text', verbosity));
  console.log();
}

console.log('=== Second derivative ===\n');
console.log(text.render(engine.run('differentiate', 'x**3', { order: 2 }), 'text', 'teacher'));
