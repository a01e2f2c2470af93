/**
 * Read all of stdin as UTF-8. Returns an empty string when stdin is a
 * terminal, so `aigcap hook` run by hand does not hang.
 */
export async function readStdin(stream: NodeJS.ReadStream = process.stdin): Promise<string> {
  if (stream.isTTY) return '';

  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf-8');
}
