import fs from "node:fs";
import { parser as createSaxParser } from "sax";
import { localName, UPC_TAG } from "./xmlTree";

export const DEFAULT_ESTIMATE_EARLY_EXIT = 1_200_000;

/**
 * Streams the document and counts closing `<upc>` tags without building a tree.
 * Once the count passes `earlyExit` the scan stops and `earlyExit + 1` is
 * returned. Resolves to `null` when the document cannot be read or is not
 * well-formed.
 */
export async function estimateUpcCount(
  filePath: string,
  earlyExit: number = DEFAULT_ESTIMATE_EARLY_EXIT,
): Promise<number | null> {
  const parser = createSaxParser(true);
  let count = 0;
  let exceeded = false;

  parser.onclosetag = (tagName: string) => {
    if (exceeded || localName(tagName) !== UPC_TAG) {
      return;
    }
    count += 1;
    if (count > earlyExit) {
      exceeded = true;
    }
  };
  parser.onerror = (error: Error) => {
    throw error;
  };

  const stream = fs.createReadStream(filePath, { encoding: "utf-8" });
  try {
    for await (const chunk of stream) {
      parser.write(String(chunk));
      if (exceeded) {
        return count;
      }
    }
    parser.close();
    return count;
  } catch {
    return null;
  } finally {
    stream.destroy();
  }
}
