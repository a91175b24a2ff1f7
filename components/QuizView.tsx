"use client";

import { useState } from "react";
import type { QuizItem } from "@/lib/types";

type Props = { items: QuizItem[]; onRetake?: () => void };

export function scoreQuiz(items: QuizItem[], answers: (number | null)[]): number {
  return items.filter((q, i) => answers[i] === q.correctIndex).length;
}

export default function QuizView({ items, onRetake }: Props) {
  const [answers, setAnswers] = useState<(number | null)[]>(() => items.map(() => null));
  const [submitted, setSubmitted] = useState(false);

  const answered = answers.filter(a => a !== null).length;
  const score = scoreQuiz(items, answers);

  function choose(qi: number, oi: number) {
    if (submitted) return;
    setAnswers(prev => prev.map((a, i) => (i === qi ? oi : a)));
  }

  function retake() {
    setAnswers(items.map(() => null));
    setSubmitted(false);
    onRetake?.();
  }

  return (
    <div className="quiz-card">
      <div className="quiz-header">
        <div className="progress-row">
          <span className="prog-label">Progress</span>
          <span className="prog-count">{answered} / {items.length}</span>
        </div>
        <div className="prog-bar">
          <div className="prog-fill" style={{ width: `${items.length ? (answered / items.length) * 100 : 0}%` }}></div>
        </div>
      </div>

      <form
        className="q-section"
        onSubmit={e => { e.preventDefault(); setSubmitted(true); }}
      >
        {items.map((q, qi) => {
          const picked = answers[qi];
          const correct = picked === q.correctIndex;
          return (
            <fieldset key={qi} className="q-block">
              <legend className="q-num">Question {qi + 1}</legend>
              <p className="q-text">{q.question}</p>
              <div className="options" role="radiogroup" aria-label={`Question ${qi + 1}`}>
                {q.options.map((opt, oi) => {
                  let cls = "opt";
                  if (submitted) {
                    cls += " locked";
                    if (oi === q.correctIndex) cls += " correct";
                    else if (oi === picked) cls += " wrong";
                  }
                  return (
                    <label key={oi} className={cls}>
                      <input
                        type="radio"
                        name={`quiz_${qi}`}
                        checked={picked === oi}
                        disabled={submitted}
                        onChange={() => choose(qi, oi)}
                      />
                      <span className="opt-letter">{String.fromCharCode(65 + oi)}</span>
                      <span>{opt}</span>
                    </label>
                  );
                })}
              </div>
              {submitted && (
                <div className={`feedback ${correct ? "correct" : "wrong"}`}>
                  {correct ? "✓ Correct!" : `✗ Answer: ${q.options[q.correctIndex]}`}
                </div>
              )}
            </fieldset>
          );
        })}

        {submitted ? (
          <div className="score-screen">
            <div className="score-num">{score}<span>/{items.length}</span></div>
            <button type="button" className="act-btn dark" onClick={retake}>↺ Retry</button>
          </div>
        ) : (
          <button type="submit" className="btn btn-primary" disabled={answered === 0}>
            📝 Submit Quiz
          </button>
        )}
      </form>
    </div>
  );
}
