import { filterItems, NO_FILTER } from "./filters";
import type { FilterCriteria, Identity, Item, ItemBank, OptionKey, QuizSession } from "./itemTypes";

export class QuizError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "QuizError";
  }
}

export function createSession(): QuizSession {
  return { identity: null, cursor: 0, score: 0, responses: {}, credited: [], filter: NO_FILTER };
}

export function signedIn(session: QuizSession, identity: Identity): QuizSession {
  return { ...session, identity };
}

// Sign-out drops everything, not just the identity.
export function signedOut(): QuizSession {
  return createSession();
}

function clampCursor(cursor: number, viewLength: number) {
  return cursor >= 0 && cursor < viewLength ? cursor : 0;
}

/**
 * Stores new filter criteria. The cursor survives only if it still points
 * inside the recomputed view.
 */
export function applyFilter(session: QuizSession, bank: ItemBank, criteria: FilterCriteria): QuizSession {
  const view = filterItems(bank, criteria);
  return { ...session, filter: { ...criteria }, cursor: clampCursor(session.cursor, view.length) };
}

export function currentItem(session: QuizSession, view: readonly Item[]): Item | null {
  if (view.length === 0) return null;
  return view[clampCursor(session.cursor, view.length)];
}

export function previousItem(session: QuizSession, view: readonly Item[]): QuizSession {
  if (view.length === 0) return { ...session, cursor: 0 };
  return { ...session, cursor: Math.max(0, session.cursor - 1) };
}

export function nextItem(session: QuizSession, view: readonly Item[]): QuizSession {
  if (view.length === 0) return { ...session, cursor: 0 };
  return { ...session, cursor: Math.min(view.length - 1, session.cursor + 1) };
}

/**
 * Records `choice` for `item`. A correct answer adds to the score only the
 * first time the item is credited; changing the answer later never takes
 * the point back.
 */
export function submitAnswer(session: QuizSession, item: Item, choice: string): QuizSession {
  const option = item.options.find((o) => o.key === choice);
  if (!option) {
    throw new QuizError(`'${choice}' is not an option of ${item.caseId} (${item.options.map((o) => o.key).join(", ")})`);
  }
  const key: OptionKey = option.key;

  const responses = { ...session.responses, [item.caseId]: key };
  const earnsCredit = key === item.correctAnswer && !session.credited.includes(item.caseId);
  if (!earnsCredit) return { ...session, responses };

  return {
    ...session,
    responses,
    score: session.score + 1,
    credited: [...session.credited, item.caseId],
  };
}
