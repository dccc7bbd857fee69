export const OPTION_KEYS = ["A", "B", "C", "D", "E"] as const;
export type OptionKey = (typeof OPTION_KEYS)[number];

export const ALL = "All";

export type ItemOption = { key: OptionKey; text: string };

export type Explanation = {
  rationale: string;
  distractors: string[];
};

export type Item = {
  caseId: string;
  domain: string;
  subSpecialty: string;
  topic: string;
  question: string;
  options: ItemOption[];
  correctAnswer: OptionKey;
  explanation: Explanation;
  guidelineReferences: string[];
};

export type ItemBank = {
  items: readonly Item[];
  byId: ReadonlyMap<string, Item>;
};

export type FilterAttribute = "domain" | "subSpecialty";
export type FilterCriteria = { domain: string; subSpecialty: string };

export type Identity = { id: string; email: string; accessToken: string };

export type ResponseRecord = Readonly<Record<string, OptionKey>>;

export type QuizSession = {
  identity: Identity | null;
  cursor: number;
  score: number;
  responses: ResponseRecord;
  // case ids whose correct answer has already been counted
  credited: readonly string[];
  filter: FilterCriteria;
};

export type Feedback = {
  isCorrect: boolean;
  chosen: OptionKey;
  correct: OptionKey;
  rationale: string;
  distractors: string[];
  references: string[];
};

export type ScoreSummary = { score: number; answered: number };
