import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { ItemBankError } from "../../src/itemBank";
import { loadItemBank } from "./itemSource";
import { fakeLogger } from "./testing";

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "item-source-"));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

function line(caseId: string, domain: string) {
  return JSON.stringify({
    case_id: caseId,
    domain,
    sub_specialty: "General",
    question: `Q ${caseId}`,
    options: { A: "yes", B: "no" },
    correct_answer: "B",
  });
}

describe("loadItemBank", () => {
  it("loads every record in file order", async () => {
    const path = join(dir, "bank.jsonl");
    await writeFile(path, [line("C1", "Cardio"), line("C2", "Cardio"), line("R1", "Resp")].join("\n"));
    const logger = fakeLogger();
    const { bank, warning } = await loadItemBank(path, logger);
    expect(bank.items.map((i) => i.caseId)).toEqual(["C1", "C2", "R1"]);
    expect(warning).toBeUndefined();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("warns and returns the empty bank for a missing file", async () => {
    const path = join(dir, "nope.jsonl");
    const logger = fakeLogger();
    const { bank, warning } = await loadItemBank(path, logger);
    expect(bank.items).toEqual([]);
    expect(warning).toBe(`Question bank not found at ${path}. Using empty dataset.`);
    expect(logger.warn).toHaveBeenCalledWith(warning, { code: "ENOENT" });
  });

  it("treats a directory as unreadable", async () => {
    const { bank, warning } = await loadItemBank(dir, fakeLogger());
    expect(bank.items).toEqual([]);
    expect(warning).toBe(`Question bank not found at ${dir}. Using empty dataset.`);
  });

  it("warns on an empty file", async () => {
    const path = join(dir, "empty.jsonl");
    await writeFile(path, "\n\n");
    const { bank, warning } = await loadItemBank(path, fakeLogger());
    expect(bank.items).toEqual([]);
    expect(warning).toBe(`Question bank at ${path} has no items.`);
  });

  it("fails on a malformed record", async () => {
    const path = join(dir, "broken.jsonl");
    await writeFile(path, [line("C1", "Cardio"), "{"].join("\n"));
    await expect(loadItemBank(path, fakeLogger())).rejects.toBeInstanceOf(ItemBankError);
  });
});
