/**
 * Read target paths from a stream, one per line. Lines are trimmed and
 * blank lines dropped; the last line needs no trailing newline.
 */
export async function readTargetsFromStream(stream: AsyncIterable<string | Buffer>): Promise<string[]> {
  let content = '';
  for await (const chunk of stream) {
    content += typeof chunk === 'string' ? chunk : chunk.toString('utf-8');
  }
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
