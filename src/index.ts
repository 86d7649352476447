import { readFile } from "node:fs/promises";
import path from "node:path";
import blessed from "blessed";
import { AnswerTranscript } from "./rag/answer/events.js";
import { initFolio, type Folio } from "./rag/app.js";
import { RAG_CONFIG } from "./rag/config.js";
import { errorMessage } from "./rag/errors.js";
import { STATUS_LABELS } from "./rag/status.js";

// ── State ───────────────────────────────────────────────────────────────────
const apiKey = RAG_CONFIG.apiKey;
if (!apiKey) {
  console.error("Error: OPENROUTER_API_KEY environment variable is required.");
  console.error("  export OPENROUTER_API_KEY=your-key");
  process.exit(1);
}

let folio: Folio | null = null;
let openSlug: string | null = null;
let page: number | undefined;
let selectedText: string | undefined;
let streaming: AbortController | null = null;

// ── UI Setup ────────────────────────────────────────────────────────────────
const screen = blessed.screen({
  smartCSR: true,
  title: "folio",
});

const chatBox = blessed.log({
  parent: screen,
  top: 0,
  left: 0,
  width: "100%",
  height: "100%-3",
  scrollable: true,
  alwaysScroll: true,
  scrollbar: {
    ch: "│",
    style: { bg: "blue" },
  },
  border: { type: "line" },
  style: {
    border: { fg: "blue" },
  },
  label: " folio ",
  tags: true,
  mouse: true,
});

const inputBox = blessed.textbox({
  parent: screen,
  bottom: 0,
  left: 0,
  width: "100%",
  height: 3,
  border: { type: "line" },
  style: {
    border: { fg: "green" },
    focus: { border: { fg: "yellow" } },
  },
  label: " you > ",
  inputOnFocus: false,
  mouse: true,
});

screen.key(["C-c"], () => process.exit(0));
inputBox.key(["C-c"], () => process.exit(0));

// Re-focus input whenever it loses focus (e.g. mouse click on chatBox)
// Use setTimeout to break the blur→focus→render→blur cycle
inputBox.on("blur", () => {
  if (!streaming) setTimeout(() => promptInput(), 0);
});

chatBox.log("Commands: /add <pdf>, /list, /open <slug>, /ingest [slug], /page <n>, /select <text>, /clear.");
chatBox.log("Anything else is a question about the open document. Esc stops an answer, Ctrl+C quits.");
chatBox.log("");
screen.render();

function promptInput(): void {
  inputBox.readInput(() => {/* handled by submit event */});
}

function info(msg: string): void {
  chatBox.log(`{grey-fg}${blessed.escape(msg)}{/}`);
  screen.render();
}

function setLabel(): void {
  const where = openSlug ? ` ${openSlug}${page ? ` p.${page}` : ""} ` : " no document ";
  chatBox.setLabel(` folio —${where}`);
}

// ── Spinner ─────────────────────────────────────────────────────────────────
const spinFrames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
let spinIdx = 0;
let spinTimer: ReturnType<typeof setInterval> | null = null;
let spinElapsed = 0;
let spinLabel = "";

function startSpinner(label: string): void {
  stopSpinner();
  spinLabel = label;
  spinIdx = 0;
  spinElapsed = 0;
  updateSpinnerLine();
  spinTimer = setInterval(() => {
    spinIdx = (spinIdx + 1) % spinFrames.length;
    spinElapsed += 100;
    updateSpinnerLine();
  }, 100);
}

function removeSpinnerLine(): void {
  const lines = chatBox.getLines();
  const lastIdx = lines.length - 1;
  if (lastIdx >= 0 && spinLabel && lines[lastIdx].includes(`${spinLabel}...`)) {
    chatBox.deleteLine(lastIdx);
  }
}

function updateSpinnerLine(): void {
  removeSpinnerLine();
  const secs = (spinElapsed / 1000).toFixed(1);
  chatBox.log(`{grey-fg}  ${spinFrames[spinIdx]} ${spinLabel}... ${secs}s{/}`);
  screen.render();
}

function stopSpinner(): void {
  if (spinTimer) {
    clearInterval(spinTimer);
    spinTimer = null;
  }
  removeSpinnerLine();
  spinLabel = "";
}

// ── Commands ────────────────────────────────────────────────────────────────
async function addDocument(core: Folio, file: string): Promise<void> {
  const bytes = await readFile(file);
  const meta = await core.library.create(path.basename(file), new Uint8Array(bytes));
  await core.scheduler.submit(meta);
  openSlug = meta.slug;
  page = undefined;
  selectedText = undefined;
  setLabel();
  info(`  added ${meta.slug}, ingesting in the background`);
}

function listDocuments(core: Folio): void {
  const docs = core.scheduler.list();
  if (docs.length === 0) {
    info("  no documents yet, /add one");
    return;
  }
  for (const doc of docs) {
    const marker = doc.slug === openSlug ? "*" : " ";
    info(`${marker} ${doc.slug}  ${STATUS_LABELS[doc.status]}  ${doc.title}`);
  }
}

function openDocument(core: Folio, slug: string): void {
  const meta = core.scheduler.getStatus(slug);
  if (!meta) {
    info(`  unknown document: ${slug}`);
    return;
  }
  openSlug = slug;
  page = undefined;
  selectedText = undefined;
  setLabel();
  info(`  opened ${meta.title} (${STATUS_LABELS[meta.status]})`);
}

async function ingestDocument(core: Folio, slug: string): Promise<void> {
  const meta = core.scheduler.getStatus(slug);
  if (!meta) {
    info(`  unknown document: ${slug}`);
    return;
  }
  const status = await core.scheduler.submit({ ...meta });
  info(`  ${slug}: ${STATUS_LABELS[status.status]}`);
}

// ── Answers ─────────────────────────────────────────────────────────────────
function renderAnswer(startLine: number, text: string): void {
  const lines = chatBox.getLines();
  for (let i = lines.length - 1; i >= startLine; i--) chatBox.deleteLine(i);
  for (const line of text.split("\n")) chatBox.log("  " + blessed.escape(line));
  screen.render();
}

async function askQuestion(core: Folio, slug: string, question: string): Promise<void> {
  const controller = new AbortController();
  streaming = controller;
  const transcript = new AnswerTranscript();
  const t0 = performance.now();
  startSpinner("thinking");

  let startLine = -1;
  const events = core.orchestrator.ask({ slug, question, selectedText, page }, controller.signal);
  for await (const event of events) {
    if (startLine < 0) {
      stopSpinner();
      startLine = chatBox.getLines().length;
    }
    renderAnswer(startLine, transcript.apply(event));
  }
  stopSpinner();

  if (controller.signal.aborted) {
    info("  (stopped)");
  } else {
    info(`  ✓ answered in ${((performance.now() - t0) / 1000).toFixed(1)}s`);
  }
  selectedText = undefined;
}

async function handle(text: string): Promise<void> {
  const core = folio;
  if (!core) {
    info("  still loading the library...");
    return;
  }

  const [command, ...rest] = text.split(/\s+/);
  const arg = text.slice(command.length).trim();
  switch (command) {
    case "/add":
      if (!arg) return info("  usage: /add <path to pdf>");
      return addDocument(core, arg);
    case "/list":
      return listDocuments(core);
    case "/ingest": {
      const slug = arg || openSlug;
      if (!slug) return info("  usage: /ingest <slug>");
      return ingestDocument(core, slug);
    }
    case "/open":
      if (!arg) return info("  usage: /open <slug>");
      return openDocument(core, arg);
    case "/page": {
      const n = Number(rest[0]);
      page = Number.isInteger(n) && n > 0 ? n : undefined;
      setLabel();
      return info(page ? `  looking at page ${page}` : "  page cleared");
    }
    case "/select":
      selectedText = arg || undefined;
      return info(selectedText ? "  selection set for the next question" : "  selection cleared");
    case "/clear":
      chatBox.setContent("");
      screen.render();
      return;
  }

  if (!openSlug) return info("  open a document first (/list, /open <slug>)");
  return askQuestion(core, openSlug, text);
}

// ── Input Handler ───────────────────────────────────────────────────────────
inputBox.on("submit", (value: string) => {
  const text = value.trim();
  inputBox.clearValue();
  screen.render();

  if (!text || streaming) {
    promptInput();
    return;
  }

  chatBox.log(`{green-fg}you >{/} ${blessed.escape(text)}`);
  inputBox.style.border.fg = "grey";
  inputBox.setLabel(" ... ");
  screen.render();

  handle(text)
    .catch((err: unknown) => {
      stopSpinner();
      chatBox.log(`{red-fg}error:{/} ${blessed.escape(errorMessage(err))}`);
    })
    .finally(() => {
      streaming = null;
      chatBox.log("");
      inputBox.style.border.fg = "green";
      inputBox.setLabel(" you > ");
      screen.render();
      promptInput();
    });
});

inputBox.key(["escape"], () => {
  inputBox.cancel();
});

// the input box is not reading while an answer streams
screen.key(["escape"], () => {
  streaming?.abort();
});

// ── Library Initialization (non-blocking) ──────────────────────────────────
initFolio({ apiKey, log: info })
  .then((core) => {
    folio = core;
    core.scheduler.onStatus((meta) => {
      const detail = meta.status === "error" && meta.error ? `: ${meta.error}` : "";
      info(`  ${meta.slug}: ${STATUS_LABELS[meta.status]}${detail}`);
    });
    setLabel();
    chatBox.log("");
    screen.render();
  })
  .catch((err: unknown) => {
    chatBox.log(`{red-fg}could not load the library: ${blessed.escape(errorMessage(err))}{/}`);
    screen.render();
  });

screen.render();
promptInput();
