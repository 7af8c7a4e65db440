import { describe, it, expect } from 'vitest';
import { Readable } from 'node:stream';
import { readTargetsFromStream } from '../../../src/cli/stdin.js';

describe('readTargetsFromStream', () => {
  it('returns one trimmed path per line, dropping blanks', async () => {
    const stream = Readable.from(['  /wt/a  \n\n/wt/b\r\n', '/wt/with space\n   \n']);
    expect(await readTargetsFromStream(stream)).toEqual(['/wt/a', '/wt/b', '/wt/with space']);
  });

  it('keeps a final line without newline', async () => {
    expect(await readTargetsFromStream(Readable.from(['/wt/a\n/wt/b']))).toEqual(['/wt/a', '/wt/b']);
  });

  it('joins lines split across chunks', async () => {
    const chunks = [Buffer.from('/wt/sp'), Buffer.from('lit\n/wt/c')];
    expect(await readTargetsFromStream(Readable.from(chunks))).toEqual(['/wt/split', '/wt/c']);
  });

  it('returns nothing for empty input', async () => {
    expect(await readTargetsFromStream(Readable.from([]))).toEqual([]);
  });
});
