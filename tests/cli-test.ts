/**
 * CLI argument parsing
 *
 * Run: node --import tsx --test tests/cli-test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseArgs } from '../cli/extract';

const argv = (...args: string[]) => ['node', 'cli/extract.ts', ...args];

describe('parseArgs', () => {
  it('reads files and long options', () => {
    assert.deepEqual(
      parseArgs(argv('q1.xlsx', '--image-column', 'A', '--name-column', 'C', 'q2.xlsx', '--output', 'out.zip', '--manifest')),
      {
        inputs: ['q1.xlsx', 'q2.xlsx'],
        imageColumn: 'A',
        nameColumn: 'C',
        output: 'out.zip',
        manifest: true,
        failOnEmpty: false,
        quiet: false,
        help: false,
      }
    );
  });

  it('reads short options and flags', () => {
    const args = parseArgs(argv('-i', 'b', '-n', 'a', '-q', '--fail-on-empty', 'parts.xlsx'));
    assert.equal(args.imageColumn, 'b');
    assert.equal(args.nameColumn, 'a');
    assert.equal(args.quiet, true);
    assert.equal(args.failOnEmpty, true);
    assert.deepEqual(args.inputs, ['parts.xlsx']);
  });

  it('ignores unknown flags and detects help', () => {
    const args = parseArgs(argv('--verbose', '-h'));
    assert.equal(args.help, true);
    assert.deepEqual(args.inputs, []);
  });

  it('leaves a column empty when its value is missing', () => {
    assert.equal(parseArgs(argv('parts.xlsx', '-i')).imageColumn, '');
  });
});
