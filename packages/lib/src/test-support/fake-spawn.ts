import { ChildProcess, type SpawnOptions } from "node:child_process";
import { once } from "node:events";
import { PassThrough } from "node:stream";
import type { SpawnFn } from "../types.ts";

export type FakeReply = {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
  /** Emit a spawn error instead of running. */
  error?: Error;
  /** Never exit on its own; only an abort signal ends the process. */
  hang?: boolean;
};

export type SpawnCall = {
  command: string;
  args: string[];
  options: SpawnOptions;
};

export type FakeSpawn = {
  spawn: SpawnFn;
  calls: SpawnCall[];
};

async function settle(child: ChildProcess, stdout: PassThrough, stderr: PassThrough, reply: FakeReply): Promise<void> {
  const ended = Promise.all([once(stdout, "end"), once(stderr, "end")]);
  stdout.end(reply.stdout ?? "");
  stderr.end(reply.stderr ?? "");
  await ended;
  child.emit("close", reply.exitCode ?? 0);
}

/** In-process stand-in for `child_process.spawn` that answers each call from `respond`. */
export function createFakeSpawn(respond: (args: string[]) => FakeReply = () => ({})): FakeSpawn {
  const calls: SpawnCall[] = [];
  const spawn: SpawnFn = (command, args, options) => {
    calls.push({ command, args: [...args], options });
    const reply = respond([...args]);
    const child = new ChildProcess();
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    child.stdout = stdout;
    child.stderr = stderr;

    if (reply.error) {
      const error = reply.error;
      setImmediate(() => child.emit("error", error));
    } else if (reply.hang) {
      options.signal?.addEventListener("abort", () => {
        child.emit("error", new Error("The operation was aborted"));
        child.emit("close", null);
      });
    } else {
      setImmediate(() => {
        settle(child, stdout, stderr, reply).catch((err: unknown) => child.emit("error", err));
      });
    }
    return child;
  };
  return { spawn, calls };
}
