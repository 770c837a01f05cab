/**
 * Want-list Parser
 *
 * Reads deck-style want-lists, one "<quantity> <card name>" per line:
 *
 *   Deck
 *   4 Lightning Bolt
 *   2 Counterspell
 *
 * Blank lines and the "Deck" section header are ignored. Lines that are not
 * a positive integer, one space, and a name are dropped and counted.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import type { WantEntry } from "../../domain/inventory.js";
import { WantlistParseError, errorMessage } from "../../errors.js";

export const DECK_HEADER = "Deck";

export interface WantlistParseResult {
  wants: WantEntry[];
  /** Lines that could not be parsed (1-indexed line numbers) */
  skipped: Array<{ line: number; text: string }>;
}

/**
 * Split one want-list line into quantity and name.
 *
 * @returns null unless the line is a positive integer followed by a name
 */
export function parseWantLine(line: string): WantEntry | null {
  const trimmed = line.trim();
  const spaceIdx = trimmed.indexOf(" ");
  if (spaceIdx <= 0) {
    return null;
  }

  const qtyStr = trimmed.substring(0, spaceIdx);
  const name = trimmed.substring(spaceIdx + 1).trim();
  if (!/^\d+$/.test(qtyStr) || !name) {
    return null;
  }

  const quantity = parseInt(qtyStr, 10);
  if (quantity <= 0) {
    return null;
  }

  return { quantity, name };
}

export function isIgnorableLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === "" || trimmed === DECK_HEADER;
}

export function parseWantlist(content: string, logger?: Logger): WantlistParseResult {
  const wants: WantEntry[] = [];
  const skipped: WantlistParseResult["skipped"] = [];

  content.split(/\r?\n/).forEach((line, i) => {
    if (isIgnorableLine(line)) return;

    const entry = parseWantLine(line);
    if (entry) {
      logger?.debug({ quantity: entry.quantity, name: entry.name }, "Parsed want");
      wants.push(entry);
    } else {
      logger?.warn({ line: i + 1, text: line }, "Could not parse want-list line");
      skipped.push({ line: i + 1, text: line });
    }
  });

  logger?.info({ wants: wants.length, skipped: skipped.length }, "Want-list parsed");

  return { wants, skipped };
}

export async function readWantlistFile(filePath: string, logger?: Logger): Promise<WantlistParseResult> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (err) {
    throw new WantlistParseError(`Cannot read want-list ${filePath}: ${errorMessage(err)}`, path.basename(filePath));
  }
  return parseWantlist(content.replace(/^\uFEFF/, ""), logger);
}
