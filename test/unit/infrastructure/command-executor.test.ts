import { describe, it, expect } from '@jest/globals';
import { createLineSplitter } from '../../../src/infrastructure/command-executor';

describe('createLineSplitter', () => {
  it('should emit complete lines across chunks', () => {
    const lines: string[] = [];
    const splitter = createLineSplitter((line) => lines.push(line));

    splitter.push('Step 1/3 : FROM exa');
    splitter.push('mple/base\r\nStep 2/3 : RUN make\n');
    splitter.push('Step 3/3');

    expect(lines).toEqual(['Step 1/3 : FROM example/base', 'Step 2/3 : RUN make']);

    splitter.flush();

    expect(lines).toEqual(['Step 1/3 : FROM example/base', 'Step 2/3 : RUN make', 'Step 3/3']);
  });

  it('should emit nothing on flush without a pending line', () => {
    const lines: string[] = [];
    const splitter = createLineSplitter((line) => lines.push(line));

    splitter.push('done\n');
    splitter.flush();

    expect(lines).toEqual(['done']);
  });
});
