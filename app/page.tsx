"use client";

import { useState, useRef, useEffect, type DragEvent } from "react";
import QuizView from "@/components/QuizView";
import * as api from "@/lib/api";
import {
  DEFAULT_QUIZ_SIZE,
  MAX_FILE_SIZE_BYTES,
  MAX_FILE_SIZE_MB,
  MAX_QUIZ_SIZE,
  MIN_QUIZ_SIZE,
  SUPPORTED_EXTS,
  describeSupportedExtensions,
  fileExtension,
  isSupportedExt,
  toMegabytes,
} from "@/lib/config";
import type { ChatTurn, QuizItem, UploadedFile, UploadOutcome } from "@/lib/types";

type Tab = "chat" | "quiz";
type Notice = { kind: "success" | "error" | "warn" | "info"; text: string };

const ACCEPT = SUPPORTED_EXTS.map(e => `.${e}`).join(",");

function clientRejection(file: File): string | null {
  if (!isSupportedExt(fileExtension(file.name))) return `File type not supported: ${file.name}`;
  if (file.size > MAX_FILE_SIZE_BYTES) return `File too large: ${toMegabytes(file.size)}MB (max: ${MAX_FILE_SIZE_MB}MB)`;
  return null;
}

function outcomeNotice(r: UploadOutcome): Notice {
  switch (r.status) {
    case "uploaded": return { kind: "success", text: `✅ ${r.name} uploaded successfully!` };
    case "duplicate": return { kind: "info", text: `${r.name} is already uploaded.` };
    case "rejected": return { kind: "warn", text: r.error ?? `${r.name} was rejected.` };
    case "failed": return { kind: "error", text: `Failed to upload ${r.name}: ${r.error ?? "unknown error"}` };
  }
}

function formatTime(ts: number) {
  return new Date(ts).toLocaleTimeString("en-GB", { hour: "2-digit", minute: "2-digit", second: "2-digit" });
}

export default function Home() {
  const [files, setFiles] = useState<UploadedFile[]>([]);
  const [supported, setSupported] = useState(describeSupportedExtensions());
  const [dragOver, setDragOver] = useState(false);
  const [uploading, setUploading] = useState(false);
  const [uploadNotices, setUploadNotices] = useState<Notice[]>([]);
  const [removing, setRemoving] = useState<string | null>(null);

  const [tab, setTab] = useState<Tab>("chat");

  const [turns, setTurns] = useState<ChatTurn[]>([]);
  const [prompt, setPrompt] = useState("");
  const [thinking, setThinking] = useState(false);
  const [chatError, setChatError] = useState("");

  const [questionCount, setQuestionCount] = useState(DEFAULT_QUIZ_SIZE);
  const [quiz, setQuiz] = useState<QuizItem[] | null>(null);
  const [quizVersion, setQuizVersion] = useState(0);
  const [loadingQuiz, setLoadingQuiz] = useState(false);
  const [quizNotice, setQuizNotice] = useState<Notice | null>(null);

  const fileInputRef = useRef<HTMLInputElement>(null);
  const chatEndRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    api.fetchSession()
      .then(s => {
        setFiles(s.files); setTurns(s.transcript); setSupported(s.supported);
        if (s.quiz?.length) { setQuiz(s.quiz); setQuizVersion(v => v + 1); }
      })
      .catch(e => setUploadNotices([{ kind: "error", text: e instanceof Error ? e.message : "Failed to load session." }]));
  }, []);

  useEffect(() => { chatEndRef.current?.scrollIntoView({ behavior: "smooth" }); }, [turns, thinking]);

  const busy = uploading || thinking || loadingQuiz;

  async function processFiles(list: File[]) {
    if (!list.length) return;
    const notices: Notice[] = [];
    const accepted: File[] = [];
    for (const f of list) {
      const reason = clientRejection(f);
      if (reason) notices.push({ kind: "warn", text: reason });
      else accepted.push(f);
    }
    setUploadNotices(notices);
    if (!accepted.length) return;

    setUploading(true);
    try {
      const { results, files: updated } = await api.uploadFiles(accepted);
      setFiles(updated);
      setUploadNotices([...notices, ...results.map(outcomeNotice)]);
    } catch (e) {
      setUploadNotices([...notices, { kind: "error", text: e instanceof Error ? e.message : "Upload failed." }]);
    }
    setUploading(false);
    if (fileInputRef.current) fileInputRef.current.value = "";
  }

  function handleDrop(e: DragEvent) {
    e.preventDefault(); setDragOver(false);
    if (busy) return;
    void processFiles(Array.from(e.dataTransfer.files ?? []));
  }

  async function remove(file: UploadedFile) {
    setRemoving(file.fileId);
    try {
      const updated = await api.removeFile(file.fileId);
      setFiles(updated);
      setUploadNotices([{ kind: "success", text: `🗑️ ${file.name} removed successfully!` }]);
      if (!updated.length) { setTurns([]); setQuiz(null); setQuizNotice(null); }
    } catch (e) {
      setUploadNotices([{ kind: "error", text: `❌ Failed to remove ${file.name}: ${e instanceof Error ? e.message : "unknown error"}` }]);
    }
    setRemoving(null);
  }

  async function ask() {
    const question = prompt.trim();
    if (!question || thinking) return;
    setThinking(true); setChatError("");
    try {
      const newTurns = await api.sendChat(question);
      setTurns(prev => [...prev, ...newTurns]);
      setPrompt("");
    } catch (e) {
      setChatError(e instanceof Error ? e.message : "Failed to generate response.");
    }
    setThinking(false);
  }

  async function generateQuiz() {
    setLoadingQuiz(true); setQuizNotice(null);
    try {
      const result = await api.requestQuiz(questionCount);
      setQuiz(result.items); setQuizVersion(v => v + 1);
      setQuizNotice(result.notice
        ? { kind: "warn", text: result.notice }
        : { kind: "success", text: "Quiz generated successfully!" });
    } catch (e) {
      setQuizNotice({ kind: "error", text: `Error generating quiz: ${e instanceof Error ? e.message : "unknown error"}` });
    }
    setLoadingQuiz(false);
  }

  async function newSession() {
    try {
      await api.endSession();
    } catch (e) {
      console.error("End session failed", e);
    }
    setFiles([]); setTurns([]); setQuiz(null); setQuizNotice(null);
    setUploadNotices([]); setChatError(""); setPrompt("");
  }

  return (
    <>
      <style>{`
        @import url('https://fonts.googleapis.com/css2?family=Instrument+Serif:ital@0;1&family=DM+Sans:ital,opsz,wght@0,9..40,300;0,9..40,400;0,9..40,500;0,9..40,600;1,9..40,300&display=swap');
        *, *::before, *::after { box-sizing: border-box; margin: 0; padding: 0; }
        body { background: #F7F5F0; font-family: 'DM Sans', sans-serif; color: #1a1a1a; }
        .page { min-height: 100vh; display: grid; grid-template-columns: 300px 1fr; }
        .sidebar { border-right: 1px solid #E8E4DD; background: #fff; padding: 28px 20px; display: flex; flex-direction: column; gap: 14px; }
        .side-title { font-family: 'Instrument Serif', serif; font-size: 22px; letter-spacing: -0.5px; }
        .main { padding: 44px 24px 96px; display: flex; justify-content: center; }
        .container { width: 100%; max-width: 720px; }
        .header { text-align: center; margin-bottom: 28px; }
        .logo { font-family: 'Instrument Serif', serif; font-size: 56px; line-height: 1; letter-spacing: -2px; }
        .logo em { font-style: italic; color: #5B6AF0; }
        .tagline { font-size: 15px; color: #999; margin-top: 6px; }

        .dropzone { border: 1.5px dashed #D0CAC0; border-radius: 14px; padding: 20px; text-align: center; cursor: pointer; transition: all 0.2s; background: #FAFAF8; }
        .dropzone:hover, .dropzone.active { border-color: #5B6AF0; background: #F5F5FF; }
        .dropzone.disabled { opacity: 0.45; cursor: not-allowed; border-color: #D0CAC0; background: #FAFAF8; }
        .dz-title { font-size: 14px; font-weight: 600; margin-bottom: 3px; }
        .dz-sub { font-size: 12px; color: #aaa; }
        .status { display: flex; align-items: center; gap: 8px; padding: 9px 12px; border-radius: 10px; font-size: 13px; font-weight: 500; }
        .status.success { background: #F0FDF4; border: 1px solid #BBF7D0; color: #166534; }
        .status.error { background: #FFF5F5; border: 1px solid #FED7D7; color: #9B2C2C; }
        .status.info { background: #F5F5FF; border: 1px solid #C7D2FE; color: #3730A3; }
        .status.warn { background: #FFFBEB; border: 1px solid #FDE68A; color: #92400E; }
        .spinner { width: 14px; height: 14px; border: 2px solid currentColor; border-top-color: transparent; border-radius: 50%; animation: spin 0.7s linear infinite; flex-shrink: 0; }
        @keyframes spin { to { transform: rotate(360deg); } }

        .file-row { display: flex; align-items: center; gap: 8px; padding: 10px 12px; border: 1px solid #F0EDE8; border-radius: 10px; }
        .file-name { font-size: 13.5px; font-weight: 600; white-space: nowrap; overflow: hidden; text-overflow: ellipsis; }
        .file-meta { font-size: 11.5px; color: #aaa; }
        .x-btn { margin-left: auto; background: none; border: none; cursor: pointer; font-size: 15px; opacity: 0.5; padding: 0; }
        .x-btn:hover { opacity: 1; }
        .x-btn:disabled { cursor: not-allowed; opacity: 0.2; }

        .btn { width: 100%; padding: 12px; font-family: 'DM Sans', sans-serif; font-size: 15px; font-weight: 600; border: none; border-radius: 12px; cursor: pointer; display: flex; align-items: center; justify-content: center; gap: 8px; margin-top: 14px; }
        .btn-primary { background: #1a1a1a; color: #fff; }
        .btn-primary:disabled { opacity: 0.35; cursor: not-allowed; }
        .btn-ghost { background: none; border: 1px solid #E8E4DD; color: #777; font-size: 13px; }

        .tabs { display: flex; background: #F0EDE8; border-radius: 12px; padding: 3px; margin-bottom: 14px; }
        .tab-btn { flex: 1; padding: 9px 4px; border: none; border-radius: 9px; font-family: 'DM Sans', sans-serif; font-size: 13px; font-weight: 600; cursor: pointer; background: none; color: #888; }
        .tab-btn.active { background: #fff; color: #1a1a1a; box-shadow: 0 1px 4px rgba(0,0,0,0.1); }

        .card, .quiz-card { background: #fff; border-radius: 20px; border: 1px solid #E8E4DD; box-shadow: 0 1px 12px rgba(0,0,0,0.04); }
        .card { padding: 24px; }
        .empty { text-align: center; color: #bbb; font-size: 14px; line-height: 1.6; padding: 36px 12px; }
        .msg { margin-bottom: 14px; display: flex; flex-direction: column; }
        .msg-role { font-size: 11px; font-weight: 700; letter-spacing: 0.08em; text-transform: uppercase; color: #C0BAB0; margin-bottom: 4px; }
        .msg-body { white-space: pre-wrap; font-size: 14px; line-height: 1.6; padding: 12px 14px; border-radius: 12px; }
        .msg.user .msg-body { background: #F0EFFF; color: #3730A3; align-self: flex-end; }
        .msg.assistant .msg-body { background: #FAFAF8; border: 1px solid #EDE9E2; }
        .composer { display: flex; gap: 8px; margin-top: 10px; }
        .composer textarea { flex: 1; height: 64px; border: 1.5px solid #E8E4DD; border-radius: 12px; padding: 12px; font-family: 'DM Sans', sans-serif; font-size: 14px; resize: none; outline: none; background: #FAFAF8; }
        .composer textarea:focus { border-color: #5B6AF0; background: #fff; }
        .send-btn { padding: 0 18px; background: #5B6AF0; color: #fff; border: none; border-radius: 12px; font-weight: 600; cursor: pointer; }
        .send-btn:disabled { opacity: 0.45; cursor: not-allowed; }

        .setting-label { font-size: 11px; font-weight: 700; letter-spacing: 0.08em; text-transform: uppercase; color: #AAA; margin-bottom: 8px; }
        .slider-wrap { display: flex; align-items: center; gap: 10px; }
        .slider { flex: 1; accent-color: #5B6AF0; }
        .slider-val { font-size: 13px; font-weight: 700; color: #5B6AF0; min-width: 20px; text-align: right; }

        .quiz-card { margin-top: 16px; overflow: hidden; }
        .quiz-header { padding: 18px 24px; border-bottom: 1px solid #F0EDE8; }
        .progress-row { display: flex; justify-content: space-between; margin-bottom: 8px; }
        .prog-label { font-size: 12px; font-weight: 600; color: #999; text-transform: uppercase; }
        .prog-count { font-size: 13px; font-weight: 600; }
        .prog-bar { height: 5px; background: #EDE9E2; border-radius: 99px; overflow: hidden; }
        .prog-fill { height: 100%; background: #5B6AF0; transition: width 0.4s ease; }
        .q-section { padding: 20px 24px; }
        .q-block { border: none; padding: 14px 0; border-bottom: 1px solid #F7F5F0; }
        .q-num { font-family: 'Instrument Serif', serif; font-size: 13px; font-style: italic; color: #5B6AF0; margin-bottom: 4px; }
        .q-text { font-size: 15px; font-weight: 500; line-height: 1.5; margin-bottom: 11px; }
        .options { display: flex; flex-direction: column; gap: 6px; margin-bottom: 8px; }
        .opt { display: flex; align-items: flex-start; gap: 10px; padding: 10px 12px; border-radius: 9px; border: 1.5px solid #EDE9E2; font-size: 13.5px; color: #444; cursor: pointer; background: #FAFAF8; }
        .opt input { margin-top: 3px; }
        .opt.locked { cursor: default; }
        .opt.correct { background: #F0FDF4; border-color: #86EFAC; color: #166534; }
        .opt.wrong { background: #FFF5F5; border-color: #FCA5A5; color: #9B2C2C; }
        .opt-letter { font-size: 11px; font-weight: 700; color: #C0BAB0; padding-top: 2px; min-width: 14px; }
        .feedback { display: inline-flex; padding: 4px 10px; border-radius: 99px; font-size: 12px; font-weight: 700; }
        .feedback.correct { background: #DCFCE7; color: #166534; }
        .feedback.wrong { background: #FEE2E2; color: #9B2C2C; }
        .score-screen { text-align: center; padding-top: 24px; }
        .score-num { font-family: 'Instrument Serif', serif; font-size: 64px; line-height: 1; letter-spacing: -3px; margin-bottom: 14px; }
        .score-num span { color: #5B6AF0; }
        .act-btn { padding: 11px 20px; border-radius: 12px; border: none; font-family: 'DM Sans', sans-serif; font-size: 14px; font-weight: 600; cursor: pointer; }
        .act-btn.dark { background: #1a1a1a; color: #fff; }

        @media (max-width: 760px) {
          .page { grid-template-columns: 1fr; }
          .sidebar { border-right: none; border-bottom: 1px solid #E8E4DD; }
          .logo { font-size: 44px; }
        }
      `}</style>

      <div className="page">
        <aside className="sidebar">
          <h2 className="side-title">📁 File Management</h2>

          <div className={`dropzone${dragOver ? " active" : ""}${busy ? " disabled" : ""}`}
            aria-disabled={busy}
            onDragOver={(e) => { e.preventDefault(); if (!busy) setDragOver(true); }}
            onDragLeave={() => setDragOver(false)}
            onDrop={handleDrop}
            onClick={() => { if (!busy) fileInputRef.current?.click(); }}>
            <input ref={fileInputRef} type="file" multiple accept={ACCEPT}
              aria-label="Upload documents"
              disabled={busy}
              onChange={(e) => { void processFiles(Array.from(e.target.files ?? [])); }}
              style={{ display: "none" }} />
            <p className="dz-title">Drop documents here or click to browse</p>
            <p className="dz-sub">Supported: {supported} · up to {MAX_FILE_SIZE_MB}MB</p>
          </div>

          {uploading && <div className="status info"><div className="spinner"></div>Uploading and indexing…</div>}
          {!uploading && uploadNotices.map((n, i) => (
            <div key={i} className={`status ${n.kind}`}>{n.text}</div>
          ))}

          {files.length > 0 && (
            <>
              <div className="setting-label">📄 Uploaded Files</div>
              {files.map(f => (
                <div key={f.fileId} className="file-row">
                  <div style={{ minWidth: 0 }}>
                    <div className="file-name">{f.name}</div>
                    <div className="file-meta">{f.sizeMb}MB · {f.extension} · {formatTime(f.uploadedAt)}</div>
                  </div>
                  <button className="x-btn" title="Remove file" aria-label={`Remove ${f.name}`}
                    disabled={removing !== null || busy} onClick={() => remove(f)}>🗑️</button>
                </div>
              ))}
            </>
          )}

          <button className="btn btn-ghost" onClick={newSession} disabled={busy}>↺ New session</button>
        </aside>

        <main className="main">
          <div className="container">
            <div className="header">
              <h1 className="logo">Study <em>Buddy</em></h1>
              <p className="tagline">Learn fast by chatting with your documents or take a quiz!</p>
            </div>

            <div className="tabs">
              <button className={`tab-btn${tab === "chat" ? " active" : ""}`} onClick={() => setTab("chat")}>💬 Chat</button>
              <button className={`tab-btn${tab === "quiz" ? " active" : ""}`} onClick={() => setTab("quiz")}>🧪 Quiz</button>
            </div>

            {tab === "chat" && (
              <div className="card">
                {turns.length === 0 && !thinking && (
                  <div className="empty">
                    {files.length ? "Ask a question about your uploaded documents." : "Upload at least one file to get started."}
                  </div>
                )}
                {turns.map(t => (
                  <div key={t.id} className={`msg ${t.role}`}>
                    <span className="msg-role">{t.role === "user" ? "You" : "Study Buddy"}</span>
                    <div className="msg-body">{t.text}</div>
                  </div>
                ))}
                {thinking && <div className="status info"><div className="spinner"></div>🤔 Thinking…</div>}
                {chatError && <div className="status error">{chatError}</div>}
                <div ref={chatEndRef} />

                <div className="composer">
                  <textarea
                    placeholder="Ask about your documents…"
                    aria-label="Ask about your documents"
                    value={prompt}
                    disabled={thinking || !files.length}
                    onChange={e => setPrompt(e.target.value)}
                    onKeyDown={e => { if (e.key === "Enter" && !e.shiftKey) { e.preventDefault(); void ask(); } }}
                  />
                  <button className="send-btn" onClick={() => void ask()} disabled={busy || !prompt.trim() || !files.length}>Send</button>
                </div>
              </div>
            )}

            {tab === "quiz" && (
              <>
                <div className="card">
                  <p style={{ fontSize: 13, color: "#999", marginBottom: 14 }}>Generate a quick quiz from your uploaded documents.</p>
                  <div className="setting-label">Questions</div>
                  <div className="slider-wrap">
                    <input className="slider" type="range" min={MIN_QUIZ_SIZE} max={MAX_QUIZ_SIZE} value={questionCount}
                      aria-label="Number of questions"
                      onChange={e => setQuestionCount(Number(e.target.value))} />
                    <span className="slider-val">{questionCount}</span>
                  </div>
                  <button className="btn btn-primary" onClick={generateQuiz} disabled={busy || !files.length}>
                    {loadingQuiz ? <><span className="spinner"></span>Generating quiz…</> : "🎯 Generate Quiz"}
                  </button>
                  {!files.length && <div className="status warn" style={{ marginTop: 12 }}>Please upload files before generating a quiz.</div>}
                  {quizNotice && <div className={`status ${quizNotice.kind}`} style={{ marginTop: 12 }}>{quizNotice.text}</div>}
                </div>

                {quiz && quiz.length > 0 && <QuizView key={quizVersion} items={quiz} />}
              </>
            )}
          </div>
        </main>
      </div>
    </>
  );
}
