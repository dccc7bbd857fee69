import { z } from "zod";
import { OPTION_KEYS, type Item, type ItemBank, type ItemOption } from "./itemTypes";

export class ItemBankError extends Error {
  constructor(message: string, readonly line?: number) {
    super(line === undefined ? message : `Line ${line}: ${message}`);
    this.name = "ItemBankError";
  }
}

const optionKeySchema = z.enum(OPTION_KEYS);

/**
 * One record of the JSONL bank, as authored.
 * Only the fields a practice session reads are validated; extra fields are ignored.
 */
const rawItemSchema = z.object({
  case_id: z.string().min(1),
  domain: z.string().min(1),
  sub_specialty: z.string().min(1),
  topic: z.string().default(""),
  question: z.string().min(1),
  options: z.record(z.string(), z.string()),
  correct_answer: z.string(),
  explanation: z
    .object({
      rationale: z.string().default(""),
      why_others_incorrect: z.array(z.string()).default([]),
    })
    .default({}),
  guideline_reference: z.array(z.string()).default([]),
});

export type RawItem = z.input<typeof rawItemSchema>;

/** Normalized item, as served by the API and checked again by the browser. */
export const itemSchema = z.object({
  caseId: z.string().min(1),
  domain: z.string(),
  subSpecialty: z.string(),
  topic: z.string(),
  question: z.string(),
  options: z.array(z.object({ key: optionKeySchema, text: z.string() })),
  correctAnswer: optionKeySchema,
  explanation: z.object({ rationale: z.string(), distractors: z.array(z.string()) }),
  guidelineReferences: z.array(z.string()),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

// Canonical A-E order; letters outside that set are dropped.
export function orderOptions(raw: Record<string, string>): ItemOption[] {
  const out: ItemOption[] = [];
  for (const key of OPTION_KEYS) {
    if (key in raw) out.push({ key, text: raw[key] });
  }
  return out;
}

export function normalizeItem(record: unknown, line?: number): Item {
  const parsed = rawItemSchema.safeParse(record);
  if (!parsed.success) throw new ItemBankError(`invalid item (${describeIssues(parsed.error)})`, line);
  const raw = parsed.data;

  const options = orderOptions(raw.options);
  if (options.length === 0) {
    throw new ItemBankError(`item ${raw.case_id} has no options among ${OPTION_KEYS.join(", ")}`, line);
  }

  const correct = optionKeySchema.safeParse(raw.correct_answer);
  if (!correct.success || !options.some((o) => o.key === correct.data)) {
    throw new ItemBankError(`item ${raw.case_id} has correct_answer '${raw.correct_answer}' that is not one of its options`, line);
  }

  return {
    caseId: raw.case_id,
    domain: raw.domain,
    subSpecialty: raw.sub_specialty,
    topic: raw.topic,
    question: raw.question,
    options,
    correctAnswer: correct.data,
    explanation: {
      rationale: raw.explanation.rationale,
      distractors: raw.explanation.why_others_incorrect,
    },
    guidelineReferences: raw.guideline_reference,
  };
}

export function createItemBank(items: readonly Item[]): ItemBank {
  const byId = new Map<string, Item>();
  for (const it of items) {
    if (byId.has(it.caseId)) throw new ItemBankError(`duplicate case_id '${it.caseId}'`);
    byId.set(it.caseId, it);
  }
  return { items, byId };
}

export const EMPTY_BANK: ItemBank = createItemBank([]);

/**
 * Parses a JSONL question bank. Blank lines are skipped; any malformed line
 * fails the whole load with the offending line number.
 */
export function parseItemBank(text: string): ItemBank {
  const items: Item[] = [];
  const seen = new Set<string>();
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const line = lines[i].trim();
    if (!line) continue;

    let record: unknown;
    try {
      record = JSON.parse(line);
    } catch (e) {
      throw new ItemBankError(`not valid JSON (${e instanceof Error ? e.message : String(e)})`, lineNo);
    }

    const item = normalizeItem(record, lineNo);
    if (seen.has(item.caseId)) throw new ItemBankError(`duplicate case_id '${item.caseId}'`, lineNo);
    seen.add(item.caseId);
    items.push(item);
  }

  return createItemBank(items);
}

/** Validates the items payload returned by `/api/items`. */
export function parseServedItems(payload: unknown): Item[] {
  const parsed = z.array(itemSchema).safeParse(payload);
  if (!parsed.success) throw new ItemBankError(`unexpected items payload (${describeIssues(parsed.error)})`);
  return parsed.data;
}
