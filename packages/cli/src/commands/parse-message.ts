/** Parse a JSON command-line argument; undefined when it is not JSON at all. */
export function parseMessageArg(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
}
