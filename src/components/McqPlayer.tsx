import React, { useEffect, useMemo, useState } from "react";
import { filterChoices, filterItems } from "../filters";
import type { Feedback, FilterCriteria, ItemBank, OptionKey, QuizSession } from "../itemTypes";
import { applyFilter, currentItem, nextItem, previousItem, submitAnswer } from "../quizSession";
import { feedbackFor, formatScore, scoreSummary } from "../scoring";

type Props = {
  bank: ItemBank;
  session: QuizSession;
  setSession: React.Dispatch<React.SetStateAction<QuizSession>>;
  warning?: string | null;
};

export function McqPlayer({ bank, session, setSession, warning }: Props) {
  const domains = useMemo(() => filterChoices(bank, "domain"), [bank]);
  const subSpecialties = useMemo(() => filterChoices(bank, "subSpecialty"), [bank]);
  const view = useMemo(() => filterItems(bank, session.filter), [bank, session.filter]);
  const current = currentItem(session, view);

  const stored = current ? session.responses[current.caseId] : undefined;
  const [choice, setChoice] = useState<OptionKey | null>(null);
  const [notice, setNotice] = useState<string | null>(null);

  useEffect(() => {
    // Preselect the stored answer, else the first option.
    setChoice(stored ?? current?.options[0]?.key ?? null);
    setNotice(null);
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [current?.caseId]);

  function changeFilter(next: Partial<FilterCriteria>) {
    setSession((s) => applyFilter(s, bank, { ...s.filter, ...next }));
  }

  function submit() {
    if (!current || !choice) return;
    setSession((s) => submitAnswer(s, current, choice));
    setNotice("Answer submitted. See explanation below.");
  }

  if (bank.items.length === 0) {
    return (
      <div className="card">
        <h2>MCQ Practice</h2>
        <div className="note">{warning ?? "No items found. Add lines to data/items.jsonl."}</div>
      </div>
    );
  }

  const feedback = current ? feedbackFor(current, session.responses) : null;

  return (
    <div className="card">
      <h2>MCQ Practice</h2>

      <details className="filters">
        <summary>Filters</summary>
        <div className="row">
          <label>
            <span className="muted small">Domain</span>
            <select value={session.filter.domain} onChange={(e) => changeFilter({ domain: e.target.value })}>
              {domains.map((d) => (
                <option key={d} value={d}>{d}</option>
              ))}
            </select>
          </label>
          <label>
            <span className="muted small">Sub-specialty</span>
            <select value={session.filter.subSpecialty} onChange={(e) => changeFilter({ subSpecialty: e.target.value })}>
              {subSpecialties.map((d) => (
                <option key={d} value={d}>{d}</option>
              ))}
            </select>
          </label>
        </div>
      </details>

      <p>Items available: <b>{view.length}</b></p>

      {current && (
        <>
          <h3 className="questionTitle">
            Question {session.cursor + 1} / {view.length} <span className="muted">· {current.caseId}</span>
          </h3>
          <div className="metaRow">
            <span className="badge">{current.domain}</span>
            <span className="badge subtle">{current.subSpecialty}</span>
          </div>
          <p><b>Topic:</b> {current.topic}</p>
          <p className="prompt">{current.question}</p>

          <div className="options">
            {current.options.map((o) => (
              <label className="option" key={o.key}>
                <input type="radio" name={current.caseId} checked={choice === o.key} onChange={() => setChoice(o.key)} />
                <span>{o.key}. {o.text}</span>
              </label>
            ))}
          </div>

          <div className="navRow">
            <button className="btn" onClick={submit} disabled={!choice}>Submit</button>
            <button className="btn ghost" onClick={() => setSession((s) => previousItem(s, view))} disabled={session.cursor === 0}>Previous</button>
            <button className="btn ghost" onClick={() => setSession((s) => nextItem(s, view))} disabled={session.cursor >= view.length - 1}>Next</button>
          </div>

          {notice && <div className="muted small">{notice}</div>}
          {feedback && <FeedbackPanel feedback={feedback} />}
        </>
      )}

      <div className="note">{formatScore(scoreSummary(session))}</div>
    </div>
  );
}

export function FeedbackPanel({ feedback }: { feedback: Feedback }) {
  return (
    <div className={"reviewItem " + (feedback.isCorrect ? "ok" : "bad")}>
      {feedback.isCorrect ? (
        <div className="verdict ok">{`Correct: ${feedback.correct}`}</div>
      ) : (
        <div className="verdict bad">{`Incorrect. Your answer: ${feedback.chosen}. Correct: ${feedback.correct}`}</div>
      )}

      <div className="explain">
        <b>Rationale</b>
        <p>{feedback.rationale}</p>
      </div>

      {feedback.distractors.length > 0 && (
        <div className="explain">
          <b>Why others are incorrect</b>
          <ul>
            {feedback.distractors.map((d, i) => <li key={i}>{d}</li>)}
          </ul>
        </div>
      )}

      {feedback.references.length > 0 && (
        <div className="explain">
          <b>Guideline references:</b>
          <ul>
            {feedback.references.map((r, i) => <li key={i}>{r}</li>)}
          </ul>
        </div>
      )}
    </div>
  );
}
