export async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/** Parse stdin as JSON, or null when it is not JSON. */
export function parseJson(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch (err) {
    process.stderr.write(`[mindfile] hook input is not JSON: ${err instanceof Error ? err.message : String(err)}\n`);
    return null;
  }
}

export function outputError(hook: string, message: string): void {
  process.stderr.write(`[mindfile:${hook}] ${message}\n`);
}
