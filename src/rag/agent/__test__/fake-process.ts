import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import type { AgentProcess, SpawnAgent, SpawnOptions } from "../process-agent.js";

/** A child process whose output the test writes by hand. */
export class FakeProcess extends EventEmitter implements AgentProcess {
  readonly pid: number | undefined = undefined;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: string[] = [];
  private closed = false;

  line(message: unknown): this {
    this.stdout.write(`${JSON.stringify(message)}\n`);
    return this;
  }

  text(...texts: string[]): this {
    return this.line({
      type: "assistant",
      message: { content: texts.map((text) => ({ type: "text", text })) },
    });
  }

  exit(code: number | null): void {
    if (this.closed) return;
    this.closed = true;
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit("close", code));
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal);
    this.exit(null);
    return true;
  }
}

export interface SpawnCall {
  command: string;
  args: string[];
  options: SpawnOptions;
}

/** A spawn that hands out `child`, scripted by `script` before the agent reads from it. */
export function fakeSpawn(child: FakeProcess, script: (child: FakeProcess) => void = () => {}) {
  const calls: SpawnCall[] = [];
  const spawn: SpawnAgent = (command, args, options) => {
    calls.push({ command, args, options });
    script(child);
    return child;
  };
  return { spawn, calls };
}
