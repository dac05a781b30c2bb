import { describe, it, expect } from 'vitest';
import { parseArgs, usage } from '../../src/cli/Args.js';
import { type CliIo, EXIT_INPUT, EXIT_INTERNAL, EXIT_OK, runCli } from '../../src/cli/Run.js';

function capture(): CliIo & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: text => stdout.push(text),
    err: text => stderr.push(text)
  };
}

describe('CLI', () => {
  describe('parseArgs', () => {
    it('should apply defaults', () => {
      expect(parseArgs(['expand', '(x+1)**2'])).toEqual({
        command: 'expand',
        positionals: ['(x+1)**2'],
        variable: 'x',
        order: 1,
        format: 'text',
        verbosity: 'detailed',
        operation: 'differentiate',
        verbose: false,
        help: false
      });
    });

    it('should read every option', () => {
      const args = parseArgs([
        'differentiate',
        'y**3',
        '-v',
        'y',
        '-n',
        '2',
        '--format',
        'json',
        '--verbosity',
        'teacher',
        '--max-steps',
        '10',
        '--verbose'
      ]);
      expect(args.variable).toBe('y');
      expect(args.order).toBe(2);
      expect(args.format).toBe('json');
      expect(args.verbosity).toBe('teacher');
      expect(args.maxSteps).toBe(10);
      expect(args.verbose).toBe(true);
    });

    it('should treat a leading minus as input', () => {
      expect(parseArgs(['differentiate', '-x**2']).positionals).toEqual(['-x**2']);
    });

    it('should reject bad option values', () => {
      expect(() => parseArgs(['differentiate', 'x', '--order', 'abc'])).toThrow(
        "Invalid value for --order: 'abc'. Must be a positive integer."
      );
      expect(() => parseArgs(['differentiate', 'x', '--order', '0'])).toThrow("Invalid value for --order: '0'");
      expect(() => parseArgs(['differentiate', 'x', '--verbosity', 'loud'])).toThrow(
        "Invalid verbosity 'loud'. Expected one of: concise, detailed, teacher"
      );
      expect(() => parseArgs(['differentiate', 'x', '--variable'])).toThrow('Missing value for --variable');
      expect(() => parseArgs(['differentiate', 'x', '--colour'])).toThrow('Unknown option "--colour"');
    });
  });

  describe('runCli', () => {
    it('should print steps and exit 0', () => {
      const io = capture();
      expect(runCli(['differentiate', 'x**2', '--verbosity', 'concise'], io)).toBe(EXIT_OK);
      expect(io.stdout).toEqual([
        [
          'Operation: differentiate',
          'Input: x**2',
          'Output: 2*x',
          '',
          'Steps:',
          '- Derivative(x**2, x) -> 2*x*Derivative(x, x)',
          '- 2*x*Derivative(x, x) -> 2*x'
        ].join('\n')
      ]);
      expect(io.stderr).toEqual([]);
    });

    it('should print JSON for matrix commands', () => {
      const io = capture();
      expect(runCli(['matrix-multiply', '[[1,2],[3,4]]', '[[5,6],[7,8]]', '--format', 'json'], io)).toBe(EXIT_OK);
      const parsed: unknown = JSON.parse(io.stdout.join('\n'));
      expect(parsed).toMatchObject({ operation: 'matrix_multiply', output: '[[19,22],[43,50]]' });
    });

    it('should show help', () => {
      const io = capture();
      expect(runCli(['--help'], io)).toBe(EXIT_OK);
      expect(io.stdout).toEqual([usage()]);
      expect(runCli([], capture())).toBe(EXIT_INPUT);
    });

    it('should list rules for an operation', () => {
      const io = capture();
      expect(runCli(['rules', '--operation', 'factor'], io)).toBe(EXIT_OK);
      expect(io.stdout).toEqual([
        `Rules for factor (highest priority first):\n${'factor_expression'.padEnd(36)} priority  100  [algebra]`
      ]);
      expect(runCli(['rules', '--operation', 'integrate'], capture())).toBe(EXIT_INPUT);
    });

    it('should exit 1 for bad input', () => {
      const cases: Array<[string[], string]> = [
        [['integrate', 'x'], 'Error: Unknown command "integrate"'],
        [['differentiate'], "Error: 'differentiate' takes 1 argument, got 0"],
        [['matrix-multiply', '[[1]]'], "Error: 'matrix-multiply' takes 2 arguments, got 1"],
        [['differentiate', '__import__'], "Error: Expression contains forbidden content '__'"],
        [['differentiate', 'x', '--variable', '1x'], "Error: Invalid variable name '1x'"],
        [['expand', 'x', '--format', 'xml'], "Error: Unknown format 'xml'. Expected one of: text, json"],
        [['differentiate', 'x', '--order', '11'], 'Error: Derivative order must be an integer between 1 and 10, got 11'],
        [['differentiate', '2**99999999*x'], 'Error: Numeric power too large to evaluate: 2**99999999'],
        [['matrix-inverse', '[[1,2],[2,4]]'], 'Error: Matrix is singular (determinant = 0) and cannot be inverted. A matrix must have a non-zero determinant to be invertible.']
      ];
      for (const [argv, message] of cases) {
        const io = capture();
        expect(runCli(argv, io)).toBe(EXIT_INPUT);
        expect(io.stderr[0]).toBe(message);
      }
    });

    it('should exit 1 for parse errors', () => {
      const io = capture();
      expect(runCli(['differentiate', 'x +'], io)).toBe(EXIT_INPUT);
      expect(io.stderr[0].startsWith('Error: Parse error at 1:')).toBe(true);
    });

    it('should exit 2 with a stack trace when the backend fails', () => {
      const io = capture();
      expect(runCli(['differentiate', 'polygamma(x, x)'], io)).toBe(EXIT_INTERNAL);
      expect(io.stderr[0]).toBe(
        'Error: Computation failed: Cannot differentiate with respect to the order of function (polygamma)'
      );
      expect(io.stderr[1]).toBe('\nStack trace:');
    });
  });
});
