import { readFile } from "node:fs/promises";
import { EMPTY_BANK, parseItemBank } from "../../src/itemBank";
import type { ItemBank } from "../../src/itemTypes";
import type { Logger } from "./logger";

export type LoadedBank = { bank: ItemBank; warning?: string };

const UNREADABLE = new Set(["ENOENT", "EISDIR", "EACCES", "ENOTDIR"]);

function errorCode(e: unknown): string | undefined {
  return e instanceof Error && "code" in e && typeof e.code === "string" ? e.code : undefined;
}

/**
 * Reads the JSONL bank at `path`. A missing or empty file gives the empty
 * bank and a warning; a malformed record throws `ItemBankError`.
 */
export async function loadItemBank(path: string, logger: Logger): Promise<LoadedBank> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    const code = errorCode(e);
    if (code === undefined || !UNREADABLE.has(code)) throw e;
    const warning = `Question bank not found at ${path}. Using empty dataset.`;
    logger.warn(warning, { code });
    return { bank: EMPTY_BANK, warning };
  }

  const bank = parseItemBank(text);
  if (bank.items.length === 0) {
    const warning = `Question bank at ${path} has no items.`;
    logger.warn(warning);
    return { bank, warning };
  }

  logger.debug("Loaded question bank", { path, items: bank.items.length });
  return { bank };
}
