import type { Feedback, Item, QuizSession, ResponseRecord, ScoreSummary } from "./itemTypes";

/** Verdict and explanation for the stored response, or null before any submission. */
export function feedbackFor(item: Item, responses: ResponseRecord): Feedback | null {
  const chosen = responses[item.caseId];
  if (chosen === undefined) return null;

  return {
    isCorrect: chosen === item.correctAnswer,
    chosen,
    correct: item.correctAnswer,
    rationale: item.explanation.rationale,
    distractors: item.explanation.distractors,
    references: item.guidelineReferences,
  };
}

// Reported out of the items answered so far, not out of the view.
export function scoreSummary(session: QuizSession): ScoreSummary {
  return { score: session.score, answered: Object.keys(session.responses).length };
}

export function formatScore(summary: ScoreSummary) {
  return `Score: ${summary.score} / ${summary.answered}`;
}
