import { createItemBank } from "../itemBank";
import type { Item, ItemBank } from "../itemTypes";

export function makeItem(caseId: string, overrides: Partial<Item> = {}): Item {
  return {
    caseId,
    domain: "Cardio",
    subSpecialty: "General",
    topic: "Topic " + caseId,
    question: `Question ${caseId}?`,
    options: [
      { key: "A", text: "First" },
      { key: "B", text: "Second" },
      { key: "C", text: "Third" },
    ],
    correctAnswer: "A",
    explanation: { rationale: `Because ${caseId}`, distractors: ["B is wrong", "C is wrong"] },
    guidelineReferences: ["Ref 1"],
    ...overrides,
  };
}

export function makeBank(items: Item[]): ItemBank {
  return createItemBank(items);
}

/** Three items: two Cardio, one Resp. */
export function threeItemBank(): ItemBank {
  return makeBank([
    makeItem("C1", { domain: "Cardio", subSpecialty: "HTN" }),
    makeItem("C2", { domain: "Cardio", subSpecialty: "AF", correctAnswer: "B" }),
    makeItem("R1", { domain: "Resp", subSpecialty: "Asthma" }),
  ]);
}
