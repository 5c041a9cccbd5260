/**
 * Decodes a buffer as UTF-8, returning `undefined` when it holds invalid byte
 * sequences. A leading BOM stays in the returned text so a rewrite keeps it.
 */
export function decodeUtf8Strict(buffer: Buffer): string | undefined {
  const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  try {
    return decoder.decode(buffer);
  } catch {
    return undefined;
  }
}
