/**
 * Chain files.
 *
 * A chain file holds one chain per block; blocks are separated by one
 * or more blank lines. Every line is trimmed before use.
 * Files are named `<targetHex>-<fanin>-<steps>.<ext>`.
 */

export const DEFAULT_CHAIN_EXTENSION = "bln";

/**
 * Conventional file name for the chains of one synthesis run.
 */
export function chainFileName(
  targetHex: string,
  fanin: number,
  steps: number,
  ext: string = DEFAULT_CHAIN_EXTENSION,
): string {
  return `${targetHex}-${String(fanin)}-${String(steps)}.${ext}`;
}

/**
 * Split file text into blocks of trimmed, non-empty lines.
 */
export function splitChainBlocks(text: string): string[][] {
  const blocks: string[][] = [];
  let current: string[] = [];

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (line === "") {
      if (current.length > 0) {
        blocks.push(current);
        current = [];
      }
    } else {
      current.push(line);
    }
  }

  if (current.length > 0) {
    blocks.push(current);
  }

  return blocks;
}
