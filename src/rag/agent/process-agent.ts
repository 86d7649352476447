import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import path from "node:path";
import type { Readable } from "node:stream";
import { fileURLToPath } from "node:url";
import { RAG_CONFIG } from "../config.js";
import { buildContextBlock, buildQuestionPrompt } from "../context-builder.js";
import { AgentError } from "../errors.js";
import { LineDecoder } from "../line-decoder.js";
import { ANSWER_STYLE, type Agent, type AgentEvent, type AgentRequest } from "./types.js";

/** The parts of a child process the agent uses; `child_process.spawn` returns one. */
export interface AgentProcess extends EventEmitter {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export interface SpawnOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export type SpawnAgent = (command: string, args: string[], options: SpawnOptions) => AgentProcess;

const spawnDetached: SpawnAgent = (command, args, options) =>
  spawn(command, args, { ...options, stdio: ["ignore", "pipe", "pipe"], detached: true });

const STDERR_TAIL = 2000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Events in one line of the agent's `stream-json` output: the text blocks of
 * an `assistant` message, or the closing `result`. Anything else, including
 * lines that are not JSON, carries no events.
 */
export function parseAgentLine(line: string): AgentEvent[] {
  if (!line.trim()) return [];
  let msg: unknown;
  try {
    msg = JSON.parse(line);
  } catch {
    return [];
  }
  if (!isRecord(msg)) return [];

  if (msg.type === "assistant" && isRecord(msg.message) && Array.isArray(msg.message.content)) {
    const events: AgentEvent[] = [];
    for (const block of msg.message.content) {
      if (isRecord(block) && block.type === "text" && typeof block.text === "string" && block.text.trim()) {
        events.push({ type: "text", text: block.text });
      }
    }
    return events;
  }

  if (msg.type === "result") {
    if (msg.is_error === true) {
      throw new AgentError(typeof msg.result === "string" ? msg.result : "Agent reported an error");
    }
    return typeof msg.result === "string" ? [{ type: "result", text: msg.result }] : [];
  }

  return [];
}

/** Runs the search CLI from this checkout, as built JavaScript or through tsx. */
export function defaultSearchCommand(): string {
  const here = fileURLToPath(import.meta.url);
  const ext = path.extname(here);
  const root = path.resolve(path.dirname(here), "..", "..", "..");
  const script = path.join(path.dirname(here), "..", "..", `search-cli${ext}`);
  if (ext === ".ts") {
    return `"${path.join(root, "node_modules", ".bin", "tsx")}" "${script}"`;
  }
  return `"${process.execPath}" "${script}"`;
}

export function defaultAgentArgs(prompt: string): string[] {
  return [
    "-p",
    prompt,
    "--output-format",
    "stream-json",
    "--verbose",
    "--allowedTools",
    "Bash(*)",
    "Read(*)",
    "Grep(*)",
    "Glob(*)",
    "WebSearch",
    "WebFetch(*)",
  ];
}

export function buildAgentPrompt(request: AgentRequest, searchCommand: string): string {
  return `You are answering a question about the PDF in the current directory.

## Files
- fulltext.txt: the extracted text, pages separated by "--- PAGE N ---" lines
- images.json and img/: extracted figures, file names describe their content
- document.pdf: the original file

## Search
Semantic search over the document:
  ${searchCommand} ${request.slug} "your query" [--top 5] [--page N]
Use it before reading fulltext.txt, and again with other wording when the first results miss.

${ANSWER_STYLE}

${buildContextBlock(request.context)}

${buildQuestionPrompt(request)}`;
}

export interface ProcessAgentOptions {
  /** Directory the agent runs in, holding the document's files. */
  documentDir: (slug: string) => string;
  dataDir?: string;
  command?: string;
  args?: (prompt: string) => string[];
  searchCommand?: string;
  spawn?: SpawnAgent;
}

/** Ends the agent and anything it started; the child leads its own process group. */
function terminate(child: AgentProcess): void {
  if (child.pid !== undefined) {
    try {
      process.kill(-child.pid, "SIGTERM");
      return;
    } catch {
      // not a group leader (or already gone), fall back to the child alone
    }
  }
  child.kill("SIGTERM");
}

/**
 * Delegates the answer to an agent CLI. The CLI's retrieval tool is the
 * search CLI, which it runs through its own shell tool. Output is read line
 * by line as events are pulled, so a slow consumer leaves the pipe full and
 * the agent waiting.
 */
export class ProcessAgent implements Agent {
  private readonly command: string;
  private readonly args: (prompt: string) => string[];
  private readonly searchCommand: string;
  private readonly spawn: SpawnAgent;
  private readonly dataDir: string;

  constructor(private readonly options: ProcessAgentOptions) {
    this.command = options.command ?? RAG_CONFIG.agentCommand;
    this.args = options.args ?? defaultAgentArgs;
    this.searchCommand = options.searchCommand ?? defaultSearchCommand();
    this.spawn = options.spawn ?? spawnDetached;
    this.dataDir = options.dataDir ?? RAG_CONFIG.dataDir;
  }

  async *run(request: AgentRequest, signal: AbortSignal): AsyncGenerator<AgentEvent> {
    if (signal.aborted) return;

    const child = this.spawn(this.command, this.args(buildAgentPrompt(request, this.searchCommand)), {
      cwd: this.options.documentDir(request.slug),
      env: { ...process.env, FOLIO_DATA_DIR: this.dataDir },
    });

    const state: { exited: boolean; killed: boolean; code: number | null; spawnError: Error | null } = {
      exited: false,
      killed: false,
      code: null,
      spawnError: null,
    };
    const stop = () => {
      if (state.exited || state.killed) return;
      state.killed = true;
      terminate(child);
    };
    const closed = new Promise<void>((resolve) => {
      child.once("close", (code: number | null) => {
        state.exited = true;
        state.code = code;
        resolve();
      });
      child.once("error", (err: Error) => {
        state.exited = true;
        state.spawnError = err;
        resolve();
      });
    });

    let stderr = "";
    child.stderr?.on("data", (chunk: Buffer | string) => {
      stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL);
    });

    signal.addEventListener("abort", stop, { once: true });

    try {
      if (!child.stdout) throw new AgentError("Agent process has no stdout");
      const decoder = new LineDecoder();
      for await (const chunk of child.stdout) {
        for (const line of decoder.push(chunk)) yield* parseAgentLine(line);
      }
      for (const line of decoder.flush()) yield* parseAgentLine(line);

      await closed;
      if (signal.aborted) throw new AgentError("Agent cancelled", { cause: signal.reason });
      if (state.spawnError) {
        throw new AgentError(`Could not run ${this.command}: ${state.spawnError.message}`, {
          cause: state.spawnError,
        });
      }
      if (state.code !== 0) {
        const detail = stderr.trim() ? `: ${stderr.trim()}` : "";
        throw new AgentError(`Agent exited with code ${state.code ?? "null"}${detail}`);
      }
    } finally {
      signal.removeEventListener("abort", stop);
      stop();
    }
  }
}
